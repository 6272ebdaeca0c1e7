/**
 * Providers Module
 *
 * Platform clients behind the PositionProvider capability interface.
 */

export {
  AudibleProvider,
  type AudibleProviderOptions,
  audibleApiBaseUrl,
  parseAudibleTimestamp,
} from './audible.provider.js'
export {
  AudiobookshelfProvider,
  type AudiobookshelfProviderOptions,
} from './audiobookshelf.provider.js'
export { FileCredentialSource, StaticCredentialSource } from './credentials.js'
export {
  ProviderError,
  classifyHttpStatus,
  isProviderError,
  toProviderError,
} from './provider-error.js'
