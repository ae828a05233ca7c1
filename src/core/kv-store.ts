import { Etcd3 } from 'etcd3'

export interface KeyValueStore {
  get(key: string): Promise<string | null>
  set(key: string, value: string, ttlSeconds?: number): Promise<void>
  close(): void
}

export const userPasswordKey = (username: string): string => `/users/${username}/password`
export const sessionTokenKey = (token: string): string => `/session_tokens/${token}`
export const secretNameKey = (uuid: string): string => `/secrets/${uuid}/name`
export const secretValueKey = (uuid: string): string => `/secrets/${uuid}/value`

export class EtcdStore implements KeyValueStore {
  private readonly client: Etcd3

  constructor(hosts: string[]) {
    this.client = new Etcd3({ hosts })
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key).string()
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds === undefined) {
      await this.client.put(key).value(value)
      return
    }
    // Expiring keys ride on their own lease; without keep-alive etcd drops the
    // key once the TTL elapses.
    const lease = this.client.lease(ttlSeconds, { autoKeepAlive: false })
    await lease.put(key).value(value)
  }

  close(): void {
    this.client.close()
  }
}
