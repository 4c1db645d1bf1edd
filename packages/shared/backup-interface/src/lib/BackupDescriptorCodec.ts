import {z} from 'zod';
import type {BackupRecord, BackupRecordDict} from './BackupRecord.js';

export class DescriptorValidationError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'DescriptorValidationError';
    }
}

/**
 * Conversion pair between the host's descriptor object and the plain mapping stored in the sidecar.
 * The host provides one stable implementation at the integration boundary.
 */
export interface BackupDescriptorCodec<T extends BackupRecord = BackupRecord> {
    toDict(descriptor: T): BackupRecordDict;

    /**
     * @throws DescriptorValidationError when the mapping does not satisfy the contract
     */
    fromDict(dict: unknown): T;
}

/**
 * Required: backup_id, date. Optional with defaults: name, size, protected.
 * Unknown keys are kept as they are.
 */
export const backupRecordSchema = z.object({
    backup_id: z.string().min(1),
    date: z.string(),
    name: z.string().default(''),
    size: z.number().int().nonnegative().default(0),
    protected: z.boolean().default(false),
}).passthrough();

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
}

export function parseBackupRecord(dict: unknown): BackupRecord {
    const result = backupRecordSchema.safeParse(dict);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new DescriptorValidationError(`Invalid backup descriptor: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

export const backupRecordCodec: BackupDescriptorCodec<BackupRecord> = {
    toDict(descriptor: BackupRecord): BackupRecordDict {
        return {...descriptor};
    },
    fromDict(dict: unknown): BackupRecord {
        return parseBackupRecord(dict);
    },
};
