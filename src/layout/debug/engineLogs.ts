import { isDebugEnabled } from '../debugFlags';
import type { DebugChannel } from '../debugFlags';

export const logEngineEvent = (
    channel: DebugChannel,
    emoji: string,
    label: string,
    context: Record<string, unknown> = {}
): void => {
    if (!isDebugEnabled(channel)) {
        return;
    }

    const payload = Object.keys(context).length > 0 ? context : undefined;
    if (payload) {
        console.log(`${emoji} [${channel}] ${label}`, payload);
    } else {
        console.log(`${emoji} [${channel}] ${label}`);
    }
};

export const logPackerTransition = (
    from: string,
    to: string,
    context: Record<string, unknown>
): void => {
    if (!isDebugEnabled('paginate')) {
        return;
    }

    logEngineEvent('paginate', to === 'page-boundary' ? '📄' : '➡️', `${from} → ${to}`, context);
};
