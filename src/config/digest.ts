import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { DigestConfig } from '../types/models';
import {
  normalizeNewerThan,
  throwValidationError,
  validateDigestEnvironment,
  validateDigestFile
} from '../models/validation';

const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Get the path of the YAML configuration file
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(process.cwd(), env.DIGEST_CONFIG_PATH || DEFAULT_CONFIG_PATH);
}

/**
 * Read the YAML configuration file; a missing file reads as empty
 */
export function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    console.warn(`Config file not found at ${configPath}, using an empty configuration`);
    return {};
  }

  const parsed: unknown = parse(readFileSync(configPath, 'utf-8'));
  return parsed ?? {};
}

/**
 * Google credential locations, needed before the rest of the configuration
 * exists (e.g. during the initial OAuth consent)
 */
export function getGoogleSettings(env: NodeJS.ProcessEnv = process.env): DigestConfig['google'] {
  return {
    credentialsPath: path.resolve(process.cwd(), env.GOOGLE_CREDENTIALS_PATH || 'credentials.json'),
    tokenPath: path.resolve(process.cwd(), env.GOOGLE_TOKEN_PATH || 'token.json')
  };
}

/**
 * Build the validated run configuration from the YAML file and the environment
 */
export function buildConfig(fileContents: unknown, env: NodeJS.ProcessEnv): DigestConfig {
  const fileResult = validateDigestFile(fileContents);
  if (fileResult.error) throwValidationError(fileResult);

  const envResult = validateDigestEnvironment(env);
  if (envResult.error) throwValidationError(envResult);

  const file = fileResult.value;
  const vars = envResult.value;

  return {
    newsletters: file.newsletters.map(n => ({ email: n.email, name: n.name })),
    newerThan: normalizeNewerThan(file.newer_than),
    interests: file.preferences.interests,
    threshold: file.preferences.threshold,
    scorer: {
      includeHeading: file.preferences.include_heading,
      batchSize: file.batch_size
    },
    maxResults: file.max_results,
    subject: file.subject,
    schedule: file.schedule,
    emailFrom: vars.EMAIL_FROM,
    emailTo: vars.EMAIL_TO,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      embeddingModel: vars.OPENAI_EMBEDDING_MODEL,
      summaryModel: vars.OPENAI_SUMMARY_MODEL
    },
    google: getGoogleSettings(env)
  };
}

/**
 * Load configuration for a run
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DigestConfig {
  return buildConfig(readConfigFile(getConfigPath(env)), env);
}
