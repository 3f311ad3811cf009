export const APP_NAME = 'stack-readiness';
export const APP_VERSION = '1.0.0';
