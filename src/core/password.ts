import * as argon2 from 'argon2'

export type PasswordVerifier = (encodedHash: string, password: string) => Promise<boolean>

export const verifyPassword: PasswordVerifier = async (encodedHash, password) => {
  if (encodedHash === '') return false
  try {
    return await argon2.verify(encodedHash, password)
  } catch {
    // argon2 rejects hashes it cannot decode; those never match
    return false
  }
}

export async function hashPassword(password: string): Promise<string> {
  if (password === '') {
    throw new Error('Password must not be empty')
  }
  return argon2.hash(password)
}
