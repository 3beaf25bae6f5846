/**
 * Server configuration module.
 *
 * Loads config from config/config.{DICT_CONFIG}.json (default 'dev').
 * Environment variables PORT, XSL_DIR and BIBLIOGRAPHY_FILE override the file.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';

/** Project root, from either src/ or dist/ */
export const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export interface AppConfig {
  port: number;
  /** Directory holding the FormOnly.xsl ... SupplementOnly.xsl stylesheets */
  xslDir: string;
  /** JSON file mapping citation reference ids to bibliography ids */
  bibliographyFile: string;
}

const configFileSchema = z.object({
  port: z.number().int().positive().optional(),
  xslDir: z.string().min(1).optional(),
  bibliographyFile: z.string().min(1).optional()
});

const DEFAULTS: AppConfig = {
  port: 3000,
  xslDir: 'xslt',
  bibliographyFile: 'data/bibliography.json'
};

export interface LoadConfigOptions {
  /** Directory holding config.*.json files (default: <root>/config) */
  configDir?: string;
  /** Config name; falls back to DICT_CONFIG, then 'dev' */
  env?: string;
}

let cachedConfig: AppConfig | null = null;

function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(projectRoot, p);
}

/**
 * Load configuration from file and environment. Replaces any cached config.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const configDir = options.configDir ?? path.join(projectRoot, 'config');
  const configEnv = options.env ?? process.env.DICT_CONFIG ?? 'dev';
  const configFileName = `config.${configEnv}.json`;
  const configPath = path.join(configDir, configFileName);

  let fileValues: z.infer<typeof configFileSchema> = {};
  if (fs.pathExistsSync(configPath)) {
    let raw: unknown;
    try {
      raw = fs.readJsonSync(configPath);
    } catch (err) {
      throw new ConfigurationError(`Cannot read ${configFileName}: ${errorMessage(err)}`);
    }
    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError(`Invalid ${configFileName}: ${problems.join('; ')}`);
    }
    fileValues = parsed.data;
    console.log(`Loaded config from ${configFileName}`);
  } else {
    console.warn(`Config file ${configFileName} not found, using defaults`);
  }

  const envPort = process.env.PORT ? parseInt(process.env.PORT, 10) : NaN;

  cachedConfig = {
    port: Number.isNaN(envPort) ? fileValues.port ?? DEFAULTS.port : envPort,
    xslDir: resolvePath(process.env.XSL_DIR ?? fileValues.xslDir ?? DEFAULTS.xslDir),
    bibliographyFile: resolvePath(
      process.env.BIBLIOGRAPHY_FILE ?? fileValues.bibliographyFile ?? DEFAULTS.bibliographyFile
    )
  };
  return cachedConfig;
}

/**
 * Get configuration, loading it on first use.
 */
export function getConfig(): AppConfig {
  return cachedConfig ?? loadConfig();
}
