import { Types } from 'mongoose';
import Reading from '../models/Reading';
import { withStorage } from './storage';
import { ReadingRepository } from './types';

interface ReadingRow {
    _id: Types.ObjectId;
    host_id: string;
    collected_at: Date;
    cpu_pct?: number | null;
    mem_pct?: number | null;
    disk_pct?: number | null;
}

const toPct = (value: unknown) => (typeof value === 'number' && Number.isFinite(value) ? value : null);

export const mongoReadingRepository: ReadingRepository = {
    findLatestForHost: (hostId) => withStorage('readings.findLatest', async () => {
        const row: ReadingRow | null = await Reading.findOne({ host_id: hostId })
            .sort({ collected_at: -1 })
            .select({ host_id: 1, collected_at: 1, cpu_pct: 1, mem_pct: 1, disk_pct: 1 })
            .lean<ReadingRow>();

        if (!row) return null;

        return {
            reading_id: String(row._id),
            host_id: row.host_id,
            collected_at: row.collected_at,
            cpu_pct: toPct(row.cpu_pct),
            mem_pct: toPct(row.mem_pct),
            disk_pct: toPct(row.disk_pct),
        };
    }),
};
