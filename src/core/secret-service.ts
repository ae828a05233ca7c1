import { v5 as uuidv5 } from 'uuid'

import type { AuditLog } from './audit.js'
import {
  secretNameKey,
  secretValueKey,
  sessionTokenKey,
  userPasswordKey,
  type KeyValueStore,
} from './kv-store.js'
import type { SecretMetrics } from './metrics.js'
import type { PasswordVerifier } from './password.js'
import { generateAuthorizationToken } from './token.js'
import type {
  FetchSecretFailure,
  Logger,
  LoginFailure,
  Outcome,
  SetSecretFailure,
} from './types.js'

export interface SecretServiceOptions {
  store: KeyValueStore
  audit: AuditLog
  metrics: SecretMetrics
  verifyPassword: PasswordVerifier
  log: Logger
  spiffeId: string
  tokenExpirationSecs: number
  generateToken?: () => string
}

// Secret ids are SHA1-based v5 UUIDs of the name, so a name always maps to the
// same keys.
export function secretUuid(name: string): string {
  return uuidv5(name, uuidv5.DNS)
}

export class SecretService {
  private readonly store: KeyValueStore
  private readonly audit: AuditLog
  private readonly metrics: SecretMetrics
  private readonly verifyPassword: PasswordVerifier
  private readonly log: Logger
  private readonly generateToken: () => string
  readonly spiffeId: string
  readonly tokenExpirationSecs: number

  constructor(options: SecretServiceOptions) {
    this.store = options.store
    this.audit = options.audit
    this.metrics = options.metrics
    this.verifyPassword = options.verifyPassword
    this.log = options.log
    this.spiffeId = options.spiffeId
    this.tokenExpirationSecs = options.tokenExpirationSecs
    this.generateToken = options.generateToken ?? generateAuthorizationToken
  }

  announceStart(): void {
    this.audit.record('SERVER_START', `New instance of secret-server started: ${this.spiffeId}`)
  }

  announceStop(): Promise<void> {
    return this.audit.close('SERVER_STOP', `Instance of secret-server stopped: ${this.spiffeId}`)
  }

  async login(username: string, password: string): Promise<Outcome<string, LoginFailure>> {
    const encodedPassword = await this.fetchUserPassword(username)

    if (!(await this.verifyPassword(encodedPassword, password))) {
      this.audit.record(
        'LOGIN_FAILURE_INVALID_PASSWORD',
        `Login failure for user ${username} due to invalid password`,
      )
      this.metrics.loginFailure.inc()
      return { ok: false, reason: 'unauthorized' }
    }

    const token = this.generateToken()
    try {
      await this.store.set(sessionTokenKey(token), username, this.tokenExpirationSecs)
    } catch (err: unknown) {
      this.log.error({ err, username }, 'Unable to store session token')
      this.audit.record(
        'LOGIN_FAILURE_TOKEN_CREATION_FAILURE',
        `Login failure for user ${username} due to token creation failure`,
      )
      return { ok: false, reason: 'token-creation-failed' }
    }

    this.audit.record('TOKEN_CREATED', `Session token ${token} for user ${username} created`)
    this.audit.record('LOGIN_SUCCESS', `Login success for user ${username}`)
    this.metrics.loginSuccess.inc()
    return { ok: true, value: token }
  }

  /** Resolves a session token to its username, or null when unknown or expired. */
  async validateToken(token: string): Promise<string | null> {
    try {
      return await this.store.get(sessionTokenKey(token))
    } catch (err: unknown) {
      this.log.warn({ err }, 'Unable to look up session token')
      return null
    }
  }

  async setSecret(
    name: string,
    value: string,
    token: string | undefined,
  ): Promise<Outcome<string, SetSecretFailure>> {
    if (token === undefined) {
      this.audit.record(
        'SECRET_CREATE_FAILURE_NO_TOKEN',
        `Secret ${name} failed set, no token entered attempt`,
      )
      this.metrics.secretSetDenied.inc()
      return { ok: false, reason: 'no-token' }
    }

    const username = await this.validateToken(token)
    if (username === null) {
      this.audit.record(
        'SECRET_CREATE_FAILURE_INVALID_TOKEN',
        `Secret ${name} failed set, invalid token attempt`,
      )
      this.metrics.secretSetDenied.inc()
      return { ok: false, reason: 'invalid-token' }
    }

    const uuid = secretUuid(name)
    try {
      await this.store.set(secretNameKey(uuid), name)
      await this.store.set(secretValueKey(uuid), value)
    } catch (err: unknown) {
      this.log.error({ err, uuid }, 'Unable to set secret')
      this.audit.record(
        'SECRET_CREATE_FAILURE',
        `Unable to set secret ${name} by user ${username}, internal error`,
      )
      return { ok: false, reason: 'store-failed' }
    }

    this.audit.record(
      'SECRET_CREATE_SUCCESS',
      `Secret ${name} set with UUID ${uuid} by user ${username}`,
    )
    this.metrics.secretSet.inc()
    return { ok: true, value: uuid }
  }

  async fetchSecret(
    name: string,
    token: string | undefined,
  ): Promise<Outcome<string, FetchSecretFailure>> {
    if (token === undefined) {
      this.audit.record(
        'SECRET_FETCH_FAILURE_NO_TOKEN',
        `Secret ${name} failed fetch, no token entered attempt`,
      )
      this.metrics.secretFetchDenied.inc()
      return { ok: false, reason: 'no-token' }
    }

    const username = await this.validateToken(token)
    if (username === null) {
      this.audit.record(
        'SECRET_FETCH_FAILURE_INVALID_TOKEN',
        `Secret ${name} failed fetch, invalid token attempt`,
      )
      this.metrics.secretFetchDenied.inc()
      return { ok: false, reason: 'invalid-token' }
    }

    const uuid = secretUuid(name)
    let value: string | null
    try {
      value = await this.store.get(secretValueKey(uuid))
    } catch (err: unknown) {
      this.log.error({ err, uuid }, 'Unable to fetch secret')
      value = null
    }

    if (value === null) {
      this.audit.record(
        'SECRET_FETCH_FAILURE_NOEXIST',
        `Secret ${name} failed fetch by user ${username}, does not exist`,
      )
      return { ok: false, reason: 'not-found' }
    }

    this.audit.record(
      'SECRET_FETCH_SUCCESS',
      `Secret ${name} UUID ${uuid} fetched by user ${username}`,
    )
    this.metrics.secretFetch.inc()
    return { ok: true, value }
  }

  private async fetchUserPassword(username: string): Promise<string> {
    try {
      return (await this.store.get(userPasswordKey(username))) ?? ''
    } catch (err: unknown) {
      this.log.warn({ err, username }, 'Unable to fetch user password')
      return ''
    }
  }
}
