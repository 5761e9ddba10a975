import Joi from 'joi';
import { NewsletterSource } from '../types/models';

/**
 * Validation schemas and functions for configuration input
 */

export interface RawDigestFile {
  newsletters: NewsletterSource[];
  newer_than: string | number;
  max_results: number;
  subject: string;
  schedule?: string;
  batch_size: number;
  preferences: {
    interests: string[];
    threshold: number;
    include_heading: boolean;
  };
}

export interface DigestEnvironment {
  OPENAI_API_KEY: string;
  EMAIL_FROM: string;
  EMAIL_TO: string;
  OPENAI_EMBEDDING_MODEL: string;
  OPENAI_SUMMARY_MODEL: string;
  GOOGLE_CREDENTIALS_PATH: string;
  GOOGLE_TOKEN_PATH: string;
}

export const newsletterSchema = Joi.object<NewsletterSource>({
  email: Joi.string().email().required(),
  name: Joi.string().trim().min(1).required()
});

export const digestFileSchema = Joi.object<RawDigestFile>({
  newsletters: Joi.array().items(newsletterSchema).min(1).required(),
  newer_than: Joi.alternatives()
    .try(Joi.string().trim().min(1), Joi.number().integer().min(1))
    .required(),
  max_results: Joi.number().integer().min(1).max(500).default(100),
  subject: Joi.string().trim().min(1).default('Weekly Newsletter Summary'),
  schedule: Joi.string().trim().optional(),
  batch_size: Joi.number().integer().min(1).default(64),
  preferences: Joi.object({
    // Emptiness is checked by the scorer, which owns that rule
    interests: Joi.array().items(Joi.string().allow('')).required(),
    threshold: Joi.number().min(-1).max(1).default(0.38),
    include_heading: Joi.boolean().default(false)
  }).required()
}).unknown(true);

export const digestEnvironmentSchema = Joi.object<DigestEnvironment>({
  OPENAI_API_KEY: Joi.string().required(),
  EMAIL_FROM: Joi.string().email().required(),
  EMAIL_TO: Joi.string().email().required(),
  OPENAI_EMBEDDING_MODEL: Joi.string().default('text-embedding-3-small'),
  OPENAI_SUMMARY_MODEL: Joi.string().default('gpt-4o-mini'),
  GOOGLE_CREDENTIALS_PATH: Joi.string().default('credentials.json'),
  GOOGLE_TOKEN_PATH: Joi.string().default('token.json')
}).unknown(true);

export interface GoogleClientSecrets {
  client_id: string;
  client_secret: string;
  redirect_uris: string[];
}

export interface GoogleCredentialsFile {
  installed?: GoogleClientSecrets;
  web?: GoogleClientSecrets;
}

export interface StoredTokenFile {
  access_token: string;
  refresh_token: string;
  expiry_date: string;
}

const clientSecretsSchema = Joi.object<GoogleClientSecrets>({
  client_id: Joi.string().required(),
  client_secret: Joi.string().required(),
  redirect_uris: Joi.array().items(Joi.string().uri()).min(1).default(['http://localhost:8002'])
}).unknown(true);

// Downloaded OAuth client files nest the secrets under "installed" or "web"
export const googleCredentialsSchema = Joi.object<GoogleCredentialsFile>({
  installed: clientSecretsSchema,
  web: clientSecretsSchema
}).or('installed', 'web').unknown(true);

export const storedTokenFileSchema = Joi.object<StoredTokenFile>({
  access_token: Joi.string().required(),
  refresh_token: Joi.string().required(),
  expiry_date: Joi.string().isoDate().required()
}).unknown(true);

// Validation functions
export function validateDigestFile(input: unknown): Joi.ValidationResult<RawDigestFile> {
  return digestFileSchema.validate(input, { abortEarly: false });
}

export function validateDigestEnvironment(input: unknown): Joi.ValidationResult<DigestEnvironment> {
  return digestEnvironmentSchema.validate(input, { abortEarly: false });
}

export function validateGoogleCredentials(input: unknown): Joi.ValidationResult<GoogleCredentialsFile> {
  return googleCredentialsSchema.validate(input, { abortEarly: false });
}

export function validateStoredTokenFile(input: unknown): Joi.ValidationResult<StoredTokenFile> {
  return storedTokenFileSchema.validate(input, { abortEarly: false });
}

/**
 * Normalizes a recency filter to Gmail's newer_than form.
 * "7D" -> "7d", "14" -> "14d"
 */
export function normalizeNewerThan(newerThan: string | number): string {
  const value = String(newerThan).trim().toLowerCase();

  if (/^\d+$/.test(value)) {
    return `${value}d`;
  }
  if (!/^\d+[dmy]$/.test(value)) {
    throw new ValidationError(
      "newer_than must be a number followed by 'd', 'm', or 'y' (e.g., 4d, 9m, 1y)",
      []
    );
  }
  return value;
}

// Custom validation error class
export class ValidationError extends Error {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[]) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Raised when the run's configuration cannot produce any result, such as an
 * interest list that is empty once blank entries are dropped.
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

// Helper function to throw validation errors
export function throwValidationError(result: { error?: Joi.ValidationError }): never {
  if (result.error) {
    throw new ValidationError(result.error.message, result.error.details);
  }
  throw new Error('Validation failed');
}
