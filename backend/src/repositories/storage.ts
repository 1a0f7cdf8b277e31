import { AlertIntegrityError, StorageError, isDuplicateKeyError } from '../lib/errors';

/**
 * Runs a driver call and maps failures to StorageError so the engine can
 * tell transient storage trouble apart from bad configuration.
 */
export async function withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        if (error instanceof StorageError || error instanceof AlertIntegrityError) throw error;
        throw new StorageError(operation, error);
    }
}

export async function withAlertInsert<T>(hostId: string, checkKey: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        if (isDuplicateKeyError(error)) throw new AlertIntegrityError(hostId, checkKey, error);
        throw new StorageError('alerts.open', error);
    }
}
