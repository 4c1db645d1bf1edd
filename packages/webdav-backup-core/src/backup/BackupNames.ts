/**
 * Storage naming convention. Must stay byte-for-byte compatible with backups already on the server:
 * archive `ha_backup_<id>.tar`, metadata sidecar `ha_backup_<id>.json`.
 */

export const ARCHIVE_PREFIX = 'ha_backup_';
export const ARCHIVE_SUFFIX = '.tar';
export const SIDECAR_SUFFIX = '.json';

export function archiveName(backupId: string): string {
    return `${ARCHIVE_PREFIX}${backupId}${ARCHIVE_SUFFIX}`;
}

export function sidecarName(backupId: string): string {
    return `${ARCHIVE_PREFIX}${backupId}${SIDECAR_SUFFIX}`;
}

function stripAffixes(name: string, suffix: string): string | undefined {
    if (!name.startsWith(ARCHIVE_PREFIX) || !name.endsWith(suffix)) {
        return undefined;
    }
    const id = name.slice(ARCHIVE_PREFIX.length, name.length - suffix.length);
    return id.length > 0 ? id : undefined;
}

export function idFromArchiveName(name: string): string | undefined {
    return stripAffixes(name, ARCHIVE_SUFFIX);
}

export function idFromSidecarName(name: string): string | undefined {
    return stripAffixes(name, SIDECAR_SUFFIX);
}

export function isArchiveName(name: string): boolean {
    return idFromArchiveName(name) !== undefined;
}

export function isSidecarName(name: string): boolean {
    return idFromSidecarName(name) !== undefined;
}

/** Label given to backups found without a sidecar */
export function synthesizedBackupName(backupId: string): string {
    return `WebDAV backup (${backupId})`;
}
