export const APP_NAME = 'dep-graph-explorer';
export const VERSION = '0.1.0';
