export const CLI_NAME = 'ratio-kit';
export const CLI_VERSION = '0.1.0';
