/**
 * Environment config with validation.
 */

import { z } from 'zod';
import type { GatewayConfiguration } from '../domain/configuration';
import { loadGatewayConfiguration } from '../domain/configuration';
import { ConfigurationError } from '../domain/errors';
import type { ProviderKind } from '../types/transaction';
import { PROVIDER_KINDS } from '../types/transaction';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from './http';

function getEnv(key: string, defaultValue?: string): string {
  return process.env[key] ?? defaultValue ?? '';
}

function requireEnv(key: string): string {
  const v = process.env[key];
  if (!v) throw new ConfigurationError([key]);
  return v;
}

function parseIntEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

export type GatewayConfigurations = Partial<Record<ProviderKind, GatewayConfiguration>>;

const gatewayConfigSchema = z.record(z.enum(PROVIDER_KINDS), z.record(z.unknown()));

let loaded: { raw: string; gateways: GatewayConfigurations } | undefined;

/**
 * Decode GATEWAY_CONFIG, a JSON object keyed by provider kind. Decoded once
 * per distinct value and frozen.
 */
export function parseGatewayConfig(raw: string): GatewayConfigurations {
  if (loaded?.raw === raw) return loaded.gateways;
  if (raw.trim() === '') return {};

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(['GATEWAY_CONFIG']);
  }
  const entries = gatewayConfigSchema.safeParse(json);
  if (!entries.success) {
    throw new ConfigurationError(entries.error.issues.map((issue) => ['GATEWAY_CONFIG', ...issue.path].join('.')));
  }

  const gateways: GatewayConfigurations = {};
  for (const kind of PROVIDER_KINDS) {
    const entry = entries.data[kind];
    if (entry) gateways[kind] = loadGatewayConfiguration({ ...entry, provider: kind });
  }
  loaded = { raw, gateways: Object.freeze(gateways) };
  return loaded.gateways;
}

export interface Config {
  stage: string;
  transactionsTableName: string;
  providerTimeoutMs: number;
  stepClaimTtlSec: number;
  transactionAppendMaxRetries: number;
  gateways: GatewayConfigurations;
}

export function getConfig(): Config {
  return {
    stage: getEnv('STAGE', 'dev'),
    transactionsTableName: requireEnv('TRANSACTIONS_TABLE'),
    providerTimeoutMs: parseIntEnv('PROVIDER_TIMEOUT_MS', DEFAULT_PROVIDER_TIMEOUT_MS),
    stepClaimTtlSec: parseIntEnv('STEP_CLAIM_TTL_SEC', 900),
    transactionAppendMaxRetries: parseIntEnv('TRANSACTION_APPEND_MAX_RETRIES', 5),
    gateways: parseGatewayConfig(getEnv('GATEWAY_CONFIG')),
  };
}

/** The configuration for one provider, or a ConfigurationError naming it. */
export function gatewayConfigurationFor(config: Config, kind: ProviderKind): GatewayConfiguration {
  const gateway = config.gateways[kind];
  if (!gateway) throw new ConfigurationError([`GATEWAY_CONFIG.${kind}`], kind);
  return gateway;
}
