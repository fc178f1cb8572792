import bcrypt from "bcrypt";

/**
 * Salted password hashing used for teacher credentials
 */
export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(hash: string, password: string): Promise<boolean>;
}

export const DEFAULT_BCRYPT_ROUNDS = 10;

/**
 * bcrypt on its worker pool, so a login never stalls other requests
 */
export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly rounds: number = DEFAULT_BCRYPT_ROUNDS) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(hash: string, password: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }
}
