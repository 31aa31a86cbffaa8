// LowDB Repository exports

export { DatabaseConnection } from './connection.js';
export { CharacterRepository } from './CharacterRepository.js';
export { PartyRepository } from './PartyRepository.js';
export { PlayerRepository } from './PlayerRepository.js';
export {
  MapRepository,
  fileMapStorage,
  memoryMapStorage,
  assertStorageId,
  STORAGE_ID_PATTERN,
} from './MapRepository.js';

// Type exports from repositories
export type { CharacterFilter, CharacterListResult, CharacterInput } from './CharacterRepository.js';
export type { PartyInput } from './PartyRepository.js';
export type { PlayerAccount } from './PlayerRepository.js';
export type { MapStorage } from './MapRepository.js';
export type { DatabaseConfig, CampaignSchema } from './connection.js';
