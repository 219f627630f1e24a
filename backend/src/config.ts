import path from 'node:path';

export interface AppConfig {
  port: number;
  host: string;
  configDir: string;
  runtime: string;
  sourceTimeoutMs: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 7577,
  host: '0.0.0.0',
  configDir: './config',
  runtime: 'docker',
  sourceTimeoutMs: 5000,
};

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

/**
 * Resolve settings: explicit overrides (CLI flags) win over environment variables, which win over defaults.
 */
export function resolveConfig(
  overrides: Partial<AppConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const config: AppConfig = {
    port: overrides.port ?? positiveInt(env.PORT) ?? DEFAULT_CONFIG.port,
    host: overrides.host || env.HOST || DEFAULT_CONFIG.host,
    configDir: overrides.configDir || env.DOCKPORTS_CONFIG_DIR || DEFAULT_CONFIG.configDir,
    runtime: overrides.runtime || env.DOCKPORTS_RUNTIME || DEFAULT_CONFIG.runtime,
    sourceTimeoutMs:
      overrides.sourceTimeoutMs ?? positiveInt(env.DOCKPORTS_SOURCE_TIMEOUT_MS) ?? DEFAULT_CONFIG.sourceTimeoutMs,
  };

  if (config.port > 65535) {
    throw new Error(`Invalid listen port: ${config.port}`);
  }

  return { ...config, configDir: path.resolve(config.configDir) };
}

export function hiddenPortsFile(config: AppConfig): string {
  return path.join(config.configDir, 'hidden_ports.json');
}

export function serviceNamesFile(config: AppConfig): string {
  return path.join(config.configDir, 'service-names.json');
}
