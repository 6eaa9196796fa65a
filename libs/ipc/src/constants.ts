/**
 * greetd IPC constants
 */

/** Environment variable greetd sets to its socket path */
export const GREETD_SOCK_ENV = 'GREETD_SOCK';

/** Size of the length prefix in front of every frame */
export const FRAME_HEADER_BYTES = 4;

/** Largest payload accepted from the daemon */
export const MAX_FRAME_BYTES = 1024 * 1024;
