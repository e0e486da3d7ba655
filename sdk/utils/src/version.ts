export const SDK_VERSION = '0.4.0';
