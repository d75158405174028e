/**
 * wordcase error codes enumeration
 */

/**
 * Error codes. The 4xxx range covers bad input from the caller.
 */
export enum Codes {
  INVALID_CASE_STYLE = 4001,
  INVALID_OPTIONS = 4002,
}
