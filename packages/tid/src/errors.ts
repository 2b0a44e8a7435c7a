/** TID error codes. */

export const ERR_TID_LENGTH = "ERR_TID_LENGTH";
export const ERR_TID_FORMAT = "ERR_TID_FORMAT";
export const ERR_TID_TIMESTAMP = "ERR_TID_TIMESTAMP";
export const ERR_TID_CLOCK_ID = "ERR_TID_CLOCK_ID";

export type TidErrorCode =
  | typeof ERR_TID_LENGTH
  | typeof ERR_TID_FORMAT
  | typeof ERR_TID_TIMESTAMP
  | typeof ERR_TID_CLOCK_ID;

export class TidError extends Error {
  readonly code: TidErrorCode;

  constructor(code: TidErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "TidError";
  }
}
