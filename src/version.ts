export const NAME = 'tmplwiz';
export const VERSION = '0.1.0';
