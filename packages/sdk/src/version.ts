// Version
export const VERSION = '0.1.0' as const;

/**
 * Value of the client version header
 */
export const CLIENT_VERSION = `js${VERSION}` as const;
