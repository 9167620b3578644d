/** Invalid configuration, including a server that cannot bind its address. */
export const EXIT_INVALID_CONFIGURATION = 1;

/** Unexpected internal error. */
export const EXIT_INTERNAL_ERROR = 99;
