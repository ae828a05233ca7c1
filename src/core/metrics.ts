import { Counter, Registry } from 'prom-client'

export class SecretMetrics {
  readonly registry = new Registry()

  readonly loginSuccess = this.counter(
    'simple_secrets_login_success_total',
    'Total number of sucessful logins in this instance lifetime.',
  )
  readonly loginFailure = this.counter(
    'simple_secrets_login_failure_total',
    'Total number of failed logins in this instance lifetime.',
  )
  readonly secretFetch = this.counter(
    'simple_secrets_secret_fetch_total',
    'Total number of secrets accessed in this instance lifetime.',
  )
  readonly secretFetchDenied = this.counter(
    'simple_secrets_secret_fetch_access_denied_total',
    'Total number of unsuccessful secret access attempts in this instance lifetime due to invalid token.',
  )
  readonly secretSet = this.counter(
    'simple_secrets_secret_set_total',
    'Total number of secrets set in this instance lifetime.',
  )
  readonly secretSetDenied = this.counter(
    'simple_secrets_secret_set_access_denied_total',
    'Total number of unsuccessful secret set attempts in this instance lifetime due to invalid token.',
  )

  private counter(name: string, help: string): Counter {
    return new Counter({ name, help, registers: [this.registry] })
  }

  get contentType(): string {
    return this.registry.contentType
  }

  render(): Promise<string> {
    return this.registry.metrics()
  }
}
