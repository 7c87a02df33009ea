// Sentinel classification for frequencies outside every range in the plan
export const UNKNOWN_BAND = 'unknown' as const;

export const HZ_PER_MHZ = 1_000_000;

export const BAND_FIELD_SEPARATOR = ':';
