import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { Compression, Serialization } from './protocol/messageTypes.js';
import { MAX_PAYLOAD_BYTES } from './protocol/frameCodec.js';
import type { ProtocolConfig } from './protocol/frameCodec.js';
import { loadEnvironment, readEnvOverrides, reloadEnvironment } from './utils/env.js';

const SERIALIZATION_CODES = {
  raw: Serialization.Raw,
  json: Serialization.Json,
  thrift: Serialization.Thrift,
  custom: Serialization.Custom,
} as const;

const COMPRESSION_CODES = {
  none: Compression.None,
  gzip: Compression.Gzip,
  custom: Compression.Custom,
} as const;

const protocolSchema = z
  .object({
    version: z.number().int().min(1).max(15).default(1),
    headerSizeWords: z.number().int().min(1).max(15).default(1),
    serialization: z.enum(['raw', 'json', 'thrift', 'custom']).default('json'),
    compression: z.enum(['none', 'gzip', 'custom']).default('none'),
    maxPayloadBytes: z.number().int().min(1).max(MAX_PAYLOAD_BYTES).default(MAX_PAYLOAD_BYTES),
  })
  .default({});

const audioInputSchema = z
  .object({
    sampleRate: z.number().int().min(8000).max(192_000).default(16_000),
    channels: z.number().int().min(1).max(2).default(1),
    blockFrames: z.number().int().min(1).default(3200),
  })
  .default({});

const audioOutputSchema = z
  .object({
    sampleRate: z.number().int().min(8000).max(192_000).default(24_000),
    channels: z.number().int().min(1).max(2).default(1),
    blockFrames: z.number().int().min(1).default(512),
    maxBufferedSeconds: z.number().min(0.1).max(600).default(100),
  })
  .default({});

const configSchema = z.object({
  protocol: protocolSchema,
  audio: z
    .object({
      input: audioInputSchema,
      output: audioOutputSchema,
    })
    .default({}),
  session: z
    .object({
      responseTimeoutMs: z.number().int().min(1).max(600_000).default(10_000),
      closeTimeoutMs: z.number().int().min(1).max(60_000).default(2_000),
    })
    .default({}),
  transport: z
    .object({
      url: z.string().url().optional(),
      headers: z.record(z.string()).default({}),
      openTimeoutMs: z.number().int().min(1).max(120_000).default(10_000),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof configSchema>;
export type AudioOutputConfig = AppConfig['audio']['output'];
export type AudioInputConfig = AppConfig['audio']['input'];

let cachedConfig: AppConfig | null = null;
let environmentLoaded = false;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function mergeSection(base: unknown, override: object | undefined): unknown {
  if (!override) return base;
  return { ...(isRecord(base) ? base : {}), ...override };
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const source = isRecord(raw) ? raw : {};
  const overrides = readEnvOverrides(env);
  return configSchema.parse({
    ...source,
    transport: mergeSection(source.transport, overrides.transport),
    session: mergeSection(source.session, overrides.session),
  });
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  if (!environmentLoaded) {
    loadEnvironment();
    environmentLoaded = true;
  }
  const raw = await readFile(configPath, 'utf-8');
  cachedConfig = parseConfig(JSON.parse(raw));
  return cachedConfig;
}

/** Drops the cached config and re-reads `.env` so the next `loadConfig` sees edits to either. */
export function reloadConfig(): void {
  cachedConfig = null;
  if (environmentLoaded) {
    reloadEnvironment();
  }
}

export function toProtocolConfig(protocol: AppConfig['protocol']): ProtocolConfig {
  return {
    version: protocol.version,
    headerSizeWords: protocol.headerSizeWords,
    serialization: SERIALIZATION_CODES[protocol.serialization],
    compression: COMPRESSION_CODES[protocol.compression],
    maxPayloadBytes: protocol.maxPayloadBytes,
  };
}
