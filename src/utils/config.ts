// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
}

export interface StorageConfig {
  dataDir: string;
  mapIdleEvictMinutes: number;
}

export interface RulesConfig {
  henchmanXpShare: number;
  npcsDieAtZero: boolean;
}

export interface AuthConfig {
  dmKey: string;
  bcryptRounds: number;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  rules: RulesConfig;
  auth: AuthConfig;
}

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === '1' || value.toLowerCase() === 'true';
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  };
}

export function buildStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    dataDir: env.DATA_DIR || './data',
    mapIdleEvictMinutes: parseInt(env.MAP_IDLE_EVICT_MINUTES || '30', 10),
  };
}

export function buildRulesConfig(env: NodeJS.ProcessEnv = process.env): RulesConfig {
  return {
    henchmanXpShare: parseFloat(env.HENCHMAN_XP_SHARE || '0.5'),
    npcsDieAtZero: parseFlag(env.NPCS_DIE_AT_ZERO, true),
  };
}

export function buildAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  return {
    dmKey: env.DM_KEY || '',
    bcryptRounds: parseInt(env.BCRYPT_ROUNDS || '10', 10),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    storage: buildStorageConfig(env),
    rules: buildRulesConfig(env),
    auth: buildAuthConfig(env),
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.auth.dmKey) {
    errors.push('DM key is required (DM_KEY)');
  } else if (config.auth.dmKey.length < 8) {
    errors.push('DM key must be at least 8 characters');
  }

  if (Number.isNaN(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (Number.isNaN(config.rules.henchmanXpShare) || config.rules.henchmanXpShare < 0 || config.rules.henchmanXpShare > 1) {
    errors.push('Henchman XP share must be between 0 and 1 (HENCHMAN_XP_SHARE)');
  }

  if (Number.isNaN(config.storage.mapIdleEvictMinutes) || config.storage.mapIdleEvictMinutes < 0) {
    errors.push('Map idle eviction must be zero or a positive number of minutes');
  }

  if (Number.isNaN(config.auth.bcryptRounds) || config.auth.bcryptRounds < 4 || config.auth.bcryptRounds > 15) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 15');
  }

  return errors;
}
