/**
 * Gateway configuration: per-provider credentials and settings, decoded with zod
 * so that every missing or blank field is reported in one ConfigurationError.
 */

import { z } from 'zod';
import type { ProviderKind } from '../types/transaction';
import { PROVIDER_KINDS } from '../types/transaction';
import { ConfigurationError } from './errors';

export const GATEWAY_ENVIRONMENTS = ['SANDBOX', 'PRODUCTION'] as const;

export type GatewayEnvironment = (typeof GATEWAY_ENVIRONMENTS)[number];

export interface GatewayConfiguration {
  readonly provider: ProviderKind;
  readonly environment: GatewayEnvironment;
  readonly credentials: Readonly<Record<string, string>>;
  readonly settings?: Readonly<Record<string, string>>;
}

export interface GatewaySchema<C extends z.ZodTypeAny, S extends z.ZodTypeAny> {
  provider: ProviderKind;
  credentials: C;
  settings: S;
}

export interface DecodedConfiguration<C, S> {
  environment: GatewayEnvironment;
  credentials: C;
  settings: S;
}

/** Present and not blank after trimming. */
export const requiredString = z.string().trim().min(1);

const environmentSchema = z.enum(GATEWAY_ENVIRONMENTS);

export function defineGatewaySchema<C extends z.ZodTypeAny, S extends z.ZodTypeAny>(
  schema: GatewaySchema<C, S>
): GatewaySchema<C, S> {
  return schema;
}

function issueFields(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? issue.path.join('.') : '(root)'));
}

/**
 * Exact match on the canonical token. Anything else, including a different
 * case, is rejected instead of falling back to either environment.
 */
export function parseEnvironment(token: unknown): GatewayEnvironment {
  const result = environmentSchema.safeParse(token);
  if (!result.success) throw new ConfigurationError(['environment']);
  return result.data;
}

/**
 * Validate a configuration against a provider schema and return the typed view.
 * Never touches the network.
 */
export function decodeConfiguration<C extends z.ZodTypeAny, S extends z.ZodTypeAny>(
  schema: GatewaySchema<C, S>,
  config: GatewayConfiguration
): DecodedConfiguration<z.infer<C>, z.infer<S>> {
  const fields: string[] = [];
  if (config.provider !== schema.provider) fields.push('provider');

  const environment = environmentSchema.safeParse(config.environment);
  if (!environment.success) fields.push('environment');

  const credentials = schema.credentials.safeParse(config.credentials ?? {});
  if (!credentials.success) fields.push(...issueFields(credentials.error));

  const settings = schema.settings.safeParse(config.settings ?? {});
  if (!settings.success) fields.push(...issueFields(settings.error));

  if (!environment.success || !credentials.success || !settings.success || fields.length > 0) {
    throw new ConfigurationError([...new Set(fields)], schema.provider);
  }
  return { environment: environment.data, credentials: credentials.data, settings: settings.data };
}

const rawConfigurationSchema = z.object({
  provider: z.enum(PROVIDER_KINDS),
  environment: z.string(),
  credentials: z.record(z.string()).default({}),
  settings: z.record(z.string()).optional(),
});

/**
 * Load a configuration from untrusted input (environment JSON, an invocation
 * payload). The environment token is checked here, once; credential
 * completeness is left to the adapter's validateConfiguration.
 */
export function loadGatewayConfiguration(raw: unknown): GatewayConfiguration {
  const result = rawConfigurationSchema.safeParse(raw);
  if (!result.success) throw new ConfigurationError(issueFields(result.error));
  const { provider, environment, credentials, settings } = result.data;
  return Object.freeze({
    provider,
    environment: parseEnvironment(environment),
    credentials: Object.freeze({ ...credentials }),
    ...(settings && { settings: Object.freeze({ ...settings }) }),
  });
}
