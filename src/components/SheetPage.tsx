import React from 'react';

import type { DrawOp, RgbColor, SheetDocument } from '../types/sheet.types';

export interface SheetPageProps {
    document: SheetDocument;
    /** 1-based; defaults to the first page. */
    pageNumber?: number;
    /** Output pixels per point. */
    scale?: number;
}

const cssColor = (color: RgbColor | undefined): string =>
    color ? `rgb(${Math.round(color.r * 255)}, ${Math.round(color.g * 255)}, ${Math.round(color.b * 255)})` : 'none';

const renderOp = (
    op: DrawOp,
    key: string,
    document: SheetDocument,
    flipY: (y: number) => number
): React.ReactNode => {
    switch (op.type) {
        case 'rect':
            return (
                <rect
                    key={key}
                    x={op.box.x}
                    y={flipY(op.box.y + op.box.height)}
                    width={op.box.width}
                    height={op.box.height}
                    rx={op.radius || undefined}
                    fill={cssColor(op.fill)}
                    stroke={cssColor(op.stroke)}
                    strokeWidth={op.lineWidth}
                />
            );
        case 'line':
            return (
                <line
                    key={key}
                    x1={op.from.x}
                    y1={flipY(op.from.y)}
                    x2={op.to.x}
                    y2={flipY(op.to.y)}
                    stroke={cssColor(op.stroke)}
                    strokeWidth={op.lineWidth}
                />
            );
        case 'text':
            return (
                <g key={key} className="sheet-text" fill={cssColor(op.color)}>
                    {op.runs.map((run, index) => {
                        const face = document.fonts[run.fontName]?.css;
                        return (
                            <text
                                key={index}
                                x={op.x + run.offsetX}
                                y={flipY(op.y)}
                                fontSize={op.size}
                                fontFamily={face?.family}
                                fontWeight={face?.weight}
                                xmlSpace="preserve"
                                data-wide={run.isWide}
                            >
                                {run.text}
                            </text>
                        );
                    })}
                </g>
            );
        case 'group': {
            const clipId = `clip-${key}`;
            return (
                <g key={key} className="sheet-group" clipPath={op.clip ? `url(#${clipId})` : undefined}>
                    {op.clip && (
                        <clipPath id={clipId}>
                            <rect
                                x={op.clip.x}
                                y={flipY(op.clip.y + op.clip.height)}
                                width={op.clip.width}
                                height={op.clip.height}
                            />
                        </clipPath>
                    )}
                    {op.ops.map((child, index) => renderOp(child, `${key}-${index}`, document, flipY))}
                </g>
            );
        }
    }
};

/**
 * One page of a sheet document as standalone SVG.
 */
const SheetPage: React.FC<SheetPageProps> = ({ document, pageNumber = 1, scale = 1 }) => {
    const { width, height } = document.size;
    const page = document.pages.find((candidate) => candidate.pageNumber === pageNumber);
    const flipY = (y: number) => height - y;

    return (
        <svg
            xmlns="http://www.w3.org/2000/svg"
            width={Math.round(width * scale)}
            height={Math.round(height * scale)}
            viewBox={`0 0 ${width} ${height}`}
            data-page-number={pageNumber}
            data-empty={page ? undefined : true}
        >
            <rect x={0} y={0} width={width} height={height} fill="#ffffff" />
            {page?.ops.map((op, index) => renderOp(op, `p${pageNumber}-${index}`, document, flipY))}
        </svg>
    );
};

export { SheetPage };
