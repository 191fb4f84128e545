import { AppError, ErrorCode } from '../types/error.types';

/**
 * Checked u128 arithmetic for monetary amounts
 *
 * Every result must stay in [0, 2^128 - 1]; anything outside aborts the
 * call with ARITHMETIC_OVERFLOW instead of wrapping.
 */

export const U128_MAX = (1n << 128n) - 1n;

const overflow = (operation: string, a: bigint, b: bigint): AppError =>
  new AppError(ErrorCode.ARITHMETIC_OVERFLOW, `Arithmetic overflow in ${operation}`, 422, {
    operation,
    left: a.toString(),
    right: b.toString(),
  });

const checked = (operation: string, a: bigint, b: bigint, result: bigint): bigint => {
  if (result < 0n || result > U128_MAX) {
    throw overflow(operation, a, b);
  }
  return result;
};

export const checkedAdd = (a: bigint, b: bigint): bigint => checked('add', a, b, a + b);

export const checkedSub = (a: bigint, b: bigint): bigint => checked('sub', a, b, a - b);

export const checkedMul = (a: bigint, b: bigint): bigint => checked('mul', a, b, a * b);

// Division by zero is a configuration error, not an overflow
export const checkedDiv = (a: bigint, b: bigint): bigint => {
  if (b === 0n) {
    throw new AppError(ErrorCode.ARITHMETIC_OVERFLOW, 'Division by zero', 422, {
      operation: 'div',
      left: a.toString(),
    });
  }
  return checked('div', a, b, a / b);
};

export const isU128String = (value: string): boolean => /^\d+$/.test(value) && BigInt(value) <= U128_MAX;

/**
 * Parse a decimal string into an amount
 *
 * Only plain digit strings are accepted: no sign, exponent or fraction.
 */
export const parseAmount = (value: string): bigint => {
  if (!isU128String(value)) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, `Invalid amount: ${value}`, 400, { value });
  }
  return BigInt(value);
};

export const formatAmount = (value: bigint): string => value.toString();

export const minAmount = (a: bigint, b: bigint): bigint => (a < b ? a : b);
