import { inspect } from 'node:util'

export type CredentialsKind = 'basic' | 'oauth'

/**
 * The credential shape registry clients send with their requests. Fields that
 * don't apply to the selected authentication style are empty strings.
 */
export interface RegistryCredential {
  username: string
  password: string
  accessToken: string
  refreshToken: string
}

export const EmptyRegistryCredential: Readonly<RegistryCredential> = Object.freeze({
  username: '',
  password: '',
  accessToken: '',
  refreshToken: ''
})

/**
 * Credentials for one registry, either a username/password pair or an
 * OAuth-style access/refresh token pair. The secret parts never appear in
 * string, JSON or inspect output.
 */
export class Credentials {
  readonly kind: CredentialsKind
  readonly #first: string
  readonly #second: string

  private constructor(kind: CredentialsKind, first: string, second: string) {
    this.kind = kind
    this.#first = first
    this.#second = second
  }

  static basicAuth(username: string, password: string): Credentials {
    return new Credentials('basic', username, password)
  }

  static oauth(accessToken: string, refreshToken: string): Credentials {
    return new Credentials('oauth', accessToken, refreshToken)
  }

  get username(): string {
    return this.kind === 'basic' ? this.#first : ''
  }

  get password(): string {
    return this.kind === 'basic' ? this.#second : ''
  }

  get accessToken(): string {
    return this.kind === 'oauth' ? this.#first : ''
  }

  get refreshToken(): string {
    return this.kind === 'oauth' ? this.#second : ''
  }

  toRegistryCredential(): RegistryCredential {
    return {
      username: this.username,
      password: this.password,
      accessToken: this.accessToken,
      refreshToken: this.refreshToken
    }
  }

  equals(other: Credentials): boolean {
    return this.kind === other.kind && this.#first === other.#first && this.#second === other.#second
  }

  toString(): string {
    if (this.kind === 'basic') {
      return `Credentials(basic, username=${JSON.stringify(this.username)}, password=<redacted>)`
    }
    return 'Credentials(oauth, accessToken=<redacted>, refreshToken=<redacted>)'
  }

  toJSON(): { kind: CredentialsKind; username?: string } {
    return this.kind === 'basic' ? { kind: this.kind, username: this.username } : { kind: this.kind }
  }

  [inspect.custom](): string {
    return this.toString()
  }
}
