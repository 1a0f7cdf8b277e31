import CheckType from './models/CheckType';
import { DEFAULT_CHECK_TYPES } from './checks/catalog';

/**
 * Seed the built-in check catalog. Rows that already exist are left as the
 * operator configured them.
 */
export async function seedCheckTypes() {
    let inserted = 0;
    const now = new Date();

    for (const definition of DEFAULT_CHECK_TYPES) {
        // timestamps off so existing rows keep their updated_at
        const result = await CheckType.updateOne(
            { check_key: definition.check_key },
            { $setOnInsert: { ...definition, enabled: true, created_at: now, updated_at: now } },
            { upsert: true, timestamps: false }
        );
        inserted += result.upsertedCount;
    }

    console.log(`Check catalog ready (${inserted} of ${DEFAULT_CHECK_TYPES.length} default check types inserted)`);
    return inserted;
}
