import dotenv from 'dotenv';
import {tmpdir} from 'os';
import {z} from 'zod';
import {ConfigurationError} from '../errors/BackupStorageError.js';

dotenv.config();

export const DEFAULT_BACKUP_PATH = '/HomeAssistant/Backups';
export const DEFAULT_CONNECT_TIMEOUT_MS = 60000;
export const DEFAULT_PROBE_TIMEOUT_MS = 30000;

/**
 * What the host stores for one configured storage location.
 */
export interface WebdavConnectionConfig {
    /** Server base URL, e.g. https://cloud.example.com/owncloud */
    baseUrl: string;

    username: string;

    password: string;

    /** Destination folder below the DAV root (default '/HomeAssistant/Backups') */
    backupPath: string;

    /** Verify the server's TLS certificate (default true) */
    verifySsl: boolean;
}

export interface EnvConfig extends WebdavConnectionConfig {
    /** Bound on TCP/TLS connection setup; transfers themselves are unbounded (default 60000) */
    connectTimeoutMs: number;

    /** Timeout for each DAV root probe (default 30000) */
    probeTimeoutMs: number;

    /** Where uploads are spooled before transfer (default: OS temp dir) */
    tempDir: string;
}

/**
 * Trim, force a leading '/', collapse empty segments and drop any trailing '/'.
 */
export function normalizeBackupPath(path: string): string {
    const segments = path.trim().split('/').filter(segment => segment.length > 0);
    return '/' + segments.join('/');
}

const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined || value.trim() === '') {
        return defaultValue;
    }
    return !FALSE_VALUES.has(value.trim().toLowerCase());
}

function parsePositiveInt(key: string, value: string | undefined, defaultValue: number, problems: string[]): number {
    if (value === undefined || value.trim() === '') {
        return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        problems.push(`${key} must be a positive integer (got '${value}')`);
        return defaultValue;
    }
    return parsed;
}

/**
 * Build the configuration from environment variables.
 * @throws ConfigurationError listing every missing or invalid key
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const problems: string[] = [];
    for (const key of ['WEBDAV_BASE_URL', 'WEBDAV_USERNAME', 'WEBDAV_PASSWORD']) {
        if (!env[key]) {
            problems.push(`${key} is required`);
        }
    }

    const config: EnvConfig = {
        baseUrl: env.WEBDAV_BASE_URL ?? '',
        username: env.WEBDAV_USERNAME ?? '',
        password: env.WEBDAV_PASSWORD ?? '',
        backupPath: normalizeBackupPath(env.WEBDAV_BACKUP_PATH || DEFAULT_BACKUP_PATH),
        verifySsl: parseBoolean(env.WEBDAV_VERIFY_SSL, true),
        connectTimeoutMs: parsePositiveInt('WEBDAV_CONNECT_TIMEOUT_MS', env.WEBDAV_CONNECT_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS, problems),
        probeTimeoutMs: parsePositiveInt('WEBDAV_PROBE_TIMEOUT_MS', env.WEBDAV_PROBE_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS, problems),
        tempDir: env.BACKUP_TEMP_DIR || tmpdir(),
    };

    if (config.baseUrl && !URL.canParse(config.baseUrl)) {
        problems.push(`WEBDAV_BASE_URL is not a valid URL (got '${config.baseUrl}')`);
    }

    if (problems.length > 0) {
        throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, problems);
    }
    return config;
}

/**
 * Entry data as the host's configuration flow stores it.
 */
export const connectionEntrySchema = z.object({
    base_url: z.string().url(),
    username: z.string().min(1),
    password: z.string(),
    backup_path: z.string().default(DEFAULT_BACKUP_PATH),
    verify_ssl: z.boolean().default(true),
});

export type ConnectionEntryData = z.input<typeof connectionEntrySchema>;

/**
 * @throws ConfigurationError when the stored entry data is incomplete
 */
export function readConnectionConfig(data: unknown): WebdavConnectionConfig {
    const result = connectionEntrySchema.safeParse(data);
    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid connection settings: ${problems.join('; ')}`, problems);
    }
    return {
        baseUrl: result.data.base_url,
        username: result.data.username,
        password: result.data.password,
        backupPath: normalizeBackupPath(result.data.backup_path),
        verifySsl: result.data.verify_ssl,
    };
}
