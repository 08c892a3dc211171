import { randomInt } from 'node:crypto';

/**
 * Uppercase letters and digits minus the look-alikes 0/O, 1/I/L
 */
export const COUPON_CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';

export const MIN_COUPON_CODE_LENGTH = 4;
export const MAX_COUPON_CODE_LENGTH = 32;

export class CouponCodeUtil {
  /**
   * Codes are matched case-insensitively: trimmed and stored upper-case
   */
  static normalize(code: string): string {
    return code.trim().toUpperCase();
  }

  static isValidLength(length: number): boolean {
    return (
      Number.isInteger(length) &&
      length >= MIN_COUPON_CODE_LENGTH &&
      length <= MAX_COUPON_CODE_LENGTH
    );
  }

  /**
   * Draws a code from COUPON_CODE_ALPHABET.
   * `pickIndex` must return an integer in [0, max); defaults to crypto randomInt.
   */
  static random(length: number, pickIndex: (max: number) => number = randomInt): string {
    if (!CouponCodeUtil.isValidLength(length)) {
      throw new RangeError(
        `Coupon code length must be an integer between ${MIN_COUPON_CODE_LENGTH} and ${MAX_COUPON_CODE_LENGTH}`,
      );
    }

    let code = '';
    for (let i = 0; i < length; i++) {
      code += COUPON_CODE_ALPHABET.charAt(pickIndex(COUPON_CODE_ALPHABET.length));
    }
    return code;
  }
}
