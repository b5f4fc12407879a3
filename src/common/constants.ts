// Premiere Pro stores all times as integer ticks of this size
export const premiereTicksPerSecond = 254016000000;

export const defaultFps = 23.976;

export const projectRootTag = 'PremiereData';

export const mainSequenceLabel = 'Main';

export const intervalSeparator = '|';

export const unnamedClipPrefix = '<unnamed-';
