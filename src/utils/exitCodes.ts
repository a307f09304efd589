export const EXIT_SUCCESS = 0;
export const EXIT_CAPTURE_FAILED = 1;
// Bad arguments or configuration.
export const EXIT_USAGE = 2;
