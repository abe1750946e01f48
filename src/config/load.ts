import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { ConfigError } from '../types/errors.js';
import { MAX_TIMER_MS, WorkflowConfig, workflowConfigSchema } from './schema.js';

const CONFIG_CANDIDATES = ['phaserun.config.yaml', 'phaserun.config.yml', 'phaserun.config.json'];

export function resolveConfigPath(repoPath: string, configPath?: string): string {
  if (configPath) {
    return path.resolve(configPath);
  }
  for (const candidate of CONFIG_CANDIDATES) {
    const full = path.resolve(repoPath, candidate);
    if (fs.existsSync(full)) {
      return full;
    }
  }
  return path.resolve(repoPath, CONFIG_CANDIDATES[0]);
}

/**
 * Parse raw config content (YAML or JSON by extension) and validate it.
 */
export function parseConfig(content: string, configPath: string): WorkflowConfig {
  const ext = path.extname(configPath).toLowerCase();

  let parsed: unknown;
  try {
    parsed = ext === '.json' ? JSON.parse(content) : yaml.parse(content);
  } catch (error) {
    throw new ConfigError(configPath, [error instanceof Error ? error.message : String(error)]);
  }

  const result = workflowConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      configPath,
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }

  const config = result.data;
  const envTimeout = Number.parseInt(process.env.PHASERUN_WORKER_TIMEOUT_MS ?? '', 10);
  if (Number.isFinite(envTimeout) && envTimeout > 0) {
    if (envTimeout > MAX_TIMER_MS) {
      throw new ConfigError(configPath, [`PHASERUN_WORKER_TIMEOUT_MS: must be at most ${MAX_TIMER_MS}`]);
    }
    return { ...config, timeouts: { ...config.timeouts, worker_ms: envTimeout } };
  }
  return config;
}

export function loadConfig(configPath: string): WorkflowConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(configPath, ['file not found']);
  }
  const raw = fs.readFileSync(configPath, 'utf-8');
  return parseConfig(raw, configPath);
}
