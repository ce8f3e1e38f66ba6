/**
 * Validation utilities for account, restaurant and menu fields
 */

import { ValidationError } from './error-handler';

export class DataValidator {
  /**
   * Validate and normalize a username
   */
  static validateUsername(username: string): string {
    const value = username.trim();
    if (value === '') {
      throw new ValidationError('Username must not be empty', 'username');
    }
    if (value.length > 24) {
      throw new ValidationError('Username too long', 'username');
    }
    if (!/^[a-z0-9._]+$/.test(value)) {
      throw new ValidationError('Username must only contain lowercase letters, numbers, dots, and underscores', 'username');
    }
    return value;
  }

  static validatePassword(password: string): string {
    if (password.length < 6) {
      throw new ValidationError('Password must be at least 6 characters long', 'password');
    }
    return password;
  }

  /**
   * Shared rule for restaurant, menu item and person names
   */
  static validateName(name: string, field: string = 'name'): string {
    const value = name.trim();
    if (value === '') {
      throw new ValidationError(`${field} must not be blank`, field);
    }
    if (value.length > 100) {
      throw new ValidationError(`${field} too long`, field);
    }
    return value;
  }

  static validateAddress(address: string): string {
    const value = address.trim();
    if (value === '') {
      throw new ValidationError('Address must not be blank', 'address');
    }
    if (value.length > 500) {
      throw new ValidationError('Address too long', 'address');
    }
    return value;
  }

  /**
   * Validate a card number with the Luhn checksum
   */
  static validateCardNumber(cardNumber: string): string {
    const value = cardNumber.trim();
    if (value === '') {
      throw new ValidationError('Card number must not be blank', 'cardNumber');
    }
    if (!/^[0-9]+$/.test(value)) {
      throw new ValidationError('Card number must only contain numbers', 'cardNumber');
    }
    if (!this.passesLuhn(value)) {
      throw new ValidationError('Invalid card number', 'cardNumber');
    }
    return value;
  }

  static validateCardCode(code: string): string {
    const value = code.trim();
    if (!/^[0-9]{1,3}$/.test(value)) {
      throw new ValidationError('Invalid card code', 'cardCode');
    }
    return value;
  }

  /**
   * Validate a card expiry in MM/YY form
   */
  static validateCardExpiry(expiry: string): string {
    const value = expiry.trim();
    const match = /^([0-9]{2})\/([0-9]{2})$/.exec(value);
    if (!match) {
      throw new ValidationError('Invalid card expiry (must be MM/YY)', 'cardExpiry');
    }
    const month = parseInt(match[1], 10);
    if (month < 1 || month > 12) {
      throw new ValidationError('Invalid card expiry month', 'cardExpiry');
    }
    return value;
  }

  /**
   * Parse a price such as "$3.45" into integer cents
   */
  static parsePrice(price: string): number {
    const value = price.trim().replace(/^\$/, '').trim();
    if (value === '') {
      throw new ValidationError('Price must not be blank', 'price');
    }
    if (!/^[0-9]+(\.[0-9]{1,2})?$/.test(value)) {
      throw new ValidationError('Invalid price', 'price');
    }
    const [whole, fraction = ''] = value.split('.');
    return parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, '0'), 10);
  }

  /**
   * Parse a positive integer identifier from CLI or form input
   */
  static parseId(raw: string, field: string = 'id'): number {
    const value = raw.trim();
    if (!/^[0-9]+$/.test(value)) {
      throw new ValidationError(`${field} must be a positive integer`, field);
    }
    const id = parseInt(value, 10);
    if (id <= 0 || !Number.isSafeInteger(id)) {
      throw new ValidationError(`${field} must be a positive integer`, field);
    }
    return id;
  }

  private static passesLuhn(digits: string): boolean {
    let sum = 0;
    let double = false;
    for (let i = digits.length - 1; i >= 0; i--) {
      let digit = digits.charCodeAt(i) - 48;
      if (double) {
        digit *= 2;
        if (digit > 9) digit -= 9;
      }
      sum += digit;
      double = !double;
    }
    return sum % 10 === 0;
  }
}
