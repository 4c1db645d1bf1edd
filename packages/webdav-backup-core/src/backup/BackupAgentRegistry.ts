import {ListenerRegistry} from '@webdav-backup/async-utils';
import type {BackupRecord} from '@webdav-backup/backup-interface';
import type {WebdavBackupAgent} from './WebdavBackupAgent.js';

/**
 * Agents of all configured entries. The host owns one instance and passes it
 * wherever agents are registered or looked up.
 */
export class BackupAgentRegistry<T extends BackupRecord = BackupRecord> {
    private readonly agents = new Map<string, WebdavBackupAgent<T>>();
    private readonly listeners = new ListenerRegistry();

    getAgents(): WebdavBackupAgent<T>[] {
        return [...this.agents.values()];
    }

    getAgent(entryId: string): WebdavBackupAgent<T> | undefined {
        return this.agents.get(entryId);
    }

    addEntry(entryId: string, agent: WebdavBackupAgent<T>): void {
        this.agents.set(entryId, agent);
        this.listeners.notify();
    }

    removeEntry(entryId: string): boolean {
        const removed = this.agents.delete(entryId);
        this.listeners.notify();
        return removed;
    }

    /**
     * Called whenever an agent is added or removed.
     * @returns unsubscribe function
     */
    onAgentsChanged(listener: () => void): () => void {
        return this.listeners.add(listener);
    }

    notifyAgentsChanged(): void {
        this.listeners.notify();
    }
}
