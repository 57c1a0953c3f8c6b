// src/commands/validation.ts

import { NibeInvalidRegisterError, NibeInvalidValueError } from '../errors.js';

export const MAX_REGISTER = 0xffff;
export const MAX_UINT16 = 0xffff;
export const MAX_UINT32 = 0xffffffff;

/**
 * Валидация номера регистра
 * @param register - номер регистра
 */
export function validateRegister(register: number): void {
  if (!Number.isInteger(register) || register < 0 || register > MAX_REGISTER) {
    throw new NibeInvalidRegisterError(register);
  }
}

/**
 * Валидация значения для поля заданной ширины
 * @param value - значение
 * @param max - максимум поля (0xFFFF или 0xFFFFFFFF)
 */
export function validateValue(value: number, max: number = MAX_UINT32): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new NibeInvalidValueError(value, max);
  }
}
