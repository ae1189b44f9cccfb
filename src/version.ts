/** Package version, reported by --version and in the User-Agent header */
export const VERSION = '0.1.0';
