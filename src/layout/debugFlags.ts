type DebugChannel =
    | 'paginate'
    | 'grid'
    | 'header-fit'
    | 'fonts'
    | 'render';

const DEBUG_DEFAULTS: Record<DebugChannel, boolean> = {
    'paginate': false,
    'grid': false,
    'header-fit': false,
    'fonts': false,
    'render': false,
};

const ENV_VAR_MAP: Record<DebugChannel, string> = {
    'paginate': 'SHEET_DEBUG_PAGINATE',
    'grid': 'SHEET_DEBUG_GRID',
    'header-fit': 'SHEET_DEBUG_HEADER_FIT',
    'fonts': 'SHEET_DEBUG_FONTS',
    'render': 'SHEET_DEBUG_RENDER',
};

export const parseBoolean = (value: unknown): boolean | undefined => {
    if (typeof value === 'boolean') {
        return value;
    }

    if (typeof value === 'number') {
        if (value === 1) {
            return true;
        }
        if (value === 0) {
            return false;
        }
    }

    if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) {
            return true;
        }
        if (['0', 'false', 'no', 'off'].includes(normalized)) {
            return false;
        }
    }

    return undefined;
};

const readEnvFlag = (channel: DebugChannel): boolean | undefined => {
    // SHEET_DEBUG=1 switches every channel on unless a channel var says otherwise
    const channelValue = parseBoolean(process.env[ENV_VAR_MAP[channel]]);
    if (channelValue !== undefined) {
        return channelValue;
    }
    return parseBoolean(process.env.SHEET_DEBUG);
};

const readGlobalFlag = (channel: DebugChannel): boolean | undefined => {
    const candidate: unknown = Reflect.get(globalThis, '__SHEET_DEBUG_FLAGS');
    if (!candidate || typeof candidate !== 'object') {
        return undefined;
    }
    return parseBoolean(Reflect.get(candidate, channel));
};

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

export const isDebugEnabled = (channel: DebugChannel): boolean => {
    const envValue = readEnvFlag(channel);
    if (envValue !== undefined) {
        return envValue;
    }

    const globalValue = readGlobalFlag(channel);
    if (globalValue !== undefined) {
        return globalValue;
    }

    if (isProduction()) {
        return false;
    }

    return DEBUG_DEFAULTS[channel];
};

export type { DebugChannel };
