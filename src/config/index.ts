// src/config/index.ts
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

const VALID_LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];
const VALID_NODE_ENVS: readonly AppConfig['nodeEnv'][] = ['development', 'production', 'test'];

// Define the structure for the extraction service configuration
interface ExtractionConfig {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly timeoutMs: number;
    /** Number of requests in flight at once */
    readonly concurrency: number;
    readonly language: string;
}

// Define the structure of our main application configuration
export interface AppConfig {
    readonly nodeEnv: 'development' | 'production' | 'test';
    readonly logLevel: LogLevel;
    readonly sourceDir: string;
    /** Ledger file name inside sourceDir */
    readonly ledgerFilename: string;
    /** Minimum confidence for a record to be skipped and renamed */
    readonly confidenceThreshold: number;
    readonly extraction: ExtractionConfig;
}

/** Values given on the command line; they take precedence over the environment. */
export interface ConfigOverrides {
    sourceDir?: string;
    apiKey?: string;
    confidenceThreshold?: number;
    concurrency?: number;
    logLevel?: string;
}

export const CONFIG_TOKEN = Symbol.for('AppConfig');

export const DEFAULT_LEDGER_FILENAME = 'records.csv';

// --- Helper Functions ---
function parseIntEnv(env: NodeJS.ProcessEnv, varName: string, defaultValue?: number): number {
    const valueStr = env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseFloatEnv(env: NodeJS.ProcessEnv, varName: string, defaultValue?: number): number {
    const valueStr = env[varName];
    if (valueStr) {
        const valueFloat = parseFloat(valueStr);
        if (!isNaN(valueFloat)) {
            return valueFloat;
        }
        throw new ConfigurationError(`Invalid float format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function isLogLevel(value: string): value is LogLevel {
    return VALID_LOG_LEVELS.some(level => level === value);
}

function parseNodeEnv(value: string | undefined): AppConfig['nodeEnv'] {
    return VALID_NODE_ENVS.find(nodeEnv => nodeEnv === value) ?? 'development';
}

/**
 * Builds the frozen application configuration from the environment and
 * command-line overrides.
 * @throws {ConfigurationError} when a required value is missing or out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AppConfig {
    const logLevel = overrides.logLevel ?? env.LOG_LEVEL ?? 'info';
    if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`Invalid log level: ${logLevel}. Expected one of ${VALID_LOG_LEVELS.join(', ')}`);
    }

    const sourceDir = overrides.sourceDir ?? env.RECEIPT_SOURCE_DIR;
    if (!sourceDir) {
        throw new ConfigurationError('Source directory is required (--source-dir or RECEIPT_SOURCE_DIR)');
    }

    const apiKey = overrides.apiKey ?? env.TAGGUN_API_KEY ?? env.KEY;
    if (!apiKey) {
        throw new ConfigurationError('API key is required (--api-key, TAGGUN_API_KEY or KEY)');
    }

    const confidenceThreshold = overrides.confidenceThreshold ?? parseFloatEnv(env, 'RECEIPT_CONFIDENCE_THRESHOLD', 0.8);
    if (isNaN(confidenceThreshold) || confidenceThreshold < 0 || confidenceThreshold > 1) {
        throw new ConfigurationError(`Confidence threshold must be between 0 and 1, got ${confidenceThreshold}`);
    }

    const concurrency = overrides.concurrency ?? parseIntEnv(env, 'TAGGUN_CONCURRENCY', 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const config: AppConfig = {
        nodeEnv: parseNodeEnv(env.NODE_ENV),
        logLevel,
        sourceDir,
        ledgerFilename: DEFAULT_LEDGER_FILENAME,
        confidenceThreshold,
        extraction: {
            apiKey,
            baseUrl: env.TAGGUN_BASE_URL || 'https://api.taggun.io',
            timeoutMs: parseIntEnv(env, 'TAGGUN_TIMEOUT_MS', 60000),
            concurrency,
            language: env.TAGGUN_LANGUAGE || 'en',
        },
    };

    // --- Freeze Configuration ---
    Object.freeze(config.extraction);
    return Object.freeze(config);
}

/** Logs the loaded configuration, never the API key. */
export function describeConfig(config: AppConfig): string[] {
    return [
        '-------------------- Configuration Loaded --------------------',
        `NODE_ENV: ${config.nodeEnv}`,
        `LOG_LEVEL: ${config.logLevel}`,
        `Source directory: ${config.sourceDir}`,
        `Ledger file: ${config.ledgerFilename}`,
        `Confidence threshold: ${config.confidenceThreshold}`,
        `Extraction endpoint: ${config.extraction.baseUrl}`,
        `Extraction concurrency: ${config.extraction.concurrency}`,
        `Extraction timeout (ms): ${config.extraction.timeoutMs}`,
        '--------------------------------------------------------------',
    ];
}
