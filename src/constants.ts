export const APP_NAME = 'ragrelay';
export const APP_VERSION = '0.1.0';
