/**
 * Luhn (mod 10) checksum helpers
 */

const DIGITS_ONLY = /^\d+$/;

/**
 * Compute the check digit that makes `payload + digit` pass the Luhn formula
 *
 * Walks right-to-left, doubling every second digit starting with the one
 * adjacent to the (absent) check digit.
 */
export function luhnCheckDigit(payload: string): number {
  if (!DIGITS_ONLY.test(payload)) {
    throw new TypeError(`Luhn payload must be numeric, got "${payload}"`);
  }

  let sum = 0;
  let shouldDouble = true;
  for (let i = payload.length - 1; i >= 0; i--) {
    let digit = payload.charCodeAt(i) - 48;
    if (shouldDouble) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    shouldDouble = !shouldDouble;
  }

  return (10 - (sum % 10)) % 10;
}

export function isLuhnValid(pan: string): boolean {
  if (pan.length < 2 || !DIGITS_ONLY.test(pan)) {
    return false;
  }
  return luhnCheckDigit(pan.slice(0, -1)) === Number(pan.slice(-1));
}
