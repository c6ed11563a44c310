import { randomInt } from 'crypto';

const PASSWORD_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*()';

export const DEFAULT_PASSWORD_LENGTH = 16;

export const generatePassword = (length = DEFAULT_PASSWORD_LENGTH): string => {
  let password = '';
  for (let index = 0; index < length; index += 1) {
    password += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return password;
};
