export const SPECER_VERSION = '0.1.0';
