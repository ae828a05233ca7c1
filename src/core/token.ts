import { randomInt } from 'node:crypto'

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'
export const TOKEN_LENGTH = 24

export function generateAuthorizationToken(length: number = TOKEN_LENGTH): string {
  let token = ''
  for (let i = 0; i < length; i++) {
    token += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)]
  }
  return token
}
