/**
 * Namespaced debug logging
 *
 * Output is off unless enabled through the DEBUG environment variable,
 * e.g. `DEBUG=mimetree:*` or `DEBUG=mimetree:charset`.
 */

import createDebug from 'debug';

const ROOT_NAMESPACE = 'mimetree';

export type Logger = createDebug.Debugger;

/**
 * Creates a logger for one area of the library
 *
 * @param area - Namespace suffix ("charset", "header", ...)
 */
export function createLogger(area: string): Logger {
  return createDebug(`${ROOT_NAMESPACE}:${area}`);
}
