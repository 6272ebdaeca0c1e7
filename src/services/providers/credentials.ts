import { readFile } from 'node:fs/promises'
import { AudibleSessionFileSchema } from '@root/schemas/providers/audible.schema.js'
import type { CredentialSource } from '@root/types/provider.types.js'
import { ProviderError } from './provider-error.js'

/**
 * Reads the Audible session file on every call so that a token refreshed by
 * an outside process is picked up without a restart.
 */
export class FileCredentialSource implements CredentialSource {
  constructor(
    private readonly path: string,
    private readonly clock: () => number = Date.now,
  ) {}

  async getAccessToken(): Promise<string> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (error) {
      throw new ProviderError(
        `Audible session file not readable at ${this.path}`,
        { kind: 'auth', side: 'audible', cause: error },
      )
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      throw new ProviderError(
        `Audible session file at ${this.path} is not valid JSON`,
        { kind: 'auth', side: 'audible', cause: error },
      )
    }

    const parsed = AudibleSessionFileSchema.safeParse(json)
    if (!parsed.success) {
      throw new ProviderError(
        `Audible session file at ${this.path} has no access token`,
        { kind: 'auth', side: 'audible', cause: parsed.error },
      )
    }

    const { access_token: accessToken, expires } = parsed.data
    if (expires !== undefined && expires * 1000 <= this.clock()) {
      throw new ProviderError('Audible access token has expired', {
        kind: 'auth',
        side: 'audible',
      })
    }

    return accessToken
  }
}

/**
 * Fixed token, for tests and for callers that manage the session themselves
 */
export class StaticCredentialSource implements CredentialSource {
  constructor(private readonly token: string) {}

  async getAccessToken(): Promise<string> {
    return this.token
  }
}
