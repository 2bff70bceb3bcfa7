/**
 * Sheet Document Builder
 *
 * Collects draw ops page by page while a pipeline runs and hands back an
 * immutable {@link SheetDocument} at the end.
 */

import type {
    DrawOp,
    FontHandle,
    FontPair,
    PageSize,
    SheetDocument,
    SheetPage,
} from '../types/sheet.types';

/**
 * Anything that accepts draw ops. Renderers only see this.
 */
export interface DrawingSurface {
    add(op: DrawOp): void;
}

interface SheetDocumentBuilderOptions {
    title: string;
    size: PageSize;
    kind: SheetDocument['metadata']['kind'];
    preview?: boolean;
}

export class SheetDocumentBuilder implements DrawingSurface {
    private readonly pages: SheetPage[] = [];
    private readonly fonts = new Map<string, FontHandle>();
    private readonly options: SheetDocumentBuilderOptions;

    constructor(options: SheetDocumentBuilderOptions) {
        this.options = options;
    }

    get pageCount(): number {
        return this.pages.length;
    }

    registerFonts(...pairs: FontPair[]): this {
        pairs.forEach(({ narrow, wide }) => {
            this.fonts.set(narrow.name, narrow);
            this.fonts.set(wide.name, wide);
        });
        return this;
    }

    beginPage(): SheetPage {
        const page: SheetPage = { pageNumber: this.pages.length + 1, ops: [] };
        this.pages.push(page);
        return page;
    }

    add(op: DrawOp): void {
        const page = this.pages[this.pages.length - 1];
        if (!page) {
            throw new Error('No open page: call beginPage() before drawing');
        }
        page.ops.push(op);
    }

    build(): SheetDocument {
        return {
            title: this.options.title,
            size: { ...this.options.size },
            fonts: Object.fromEntries(this.fonts),
            pages: this.pages.map((page) => ({ ...page, ops: [...page.ops] })),
            metadata: {
                kind: this.options.kind,
                createdAt: new Date().toISOString(),
                preview: this.options.preview ?? false,
            },
        };
    }
}

/**
 * Buffers ops so they can be wrapped in a clipped group op.
 */
export class GroupSurface implements DrawingSurface {
    readonly ops: DrawOp[] = [];

    add(op: DrawOp): void {
        this.ops.push(op);
    }
}
