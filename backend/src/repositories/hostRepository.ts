import Host from '../models/Host';
import { HostSnapshot } from '../types';
import { withStorage } from './storage';
import { HostRepository } from './types';

interface HostRow {
    host_id: string;
    host_name: string;
    last_seen?: Date | null;
}

export const mongoHostRepository: HostRepository = {
    findActiveHosts: () => withStorage('hosts.findActive', async () => {
        const rows = await Host.find({ is_active: true })
            .select({ host_id: 1, host_name: 1, last_seen: 1 })
            .sort({ host_id: 1 })
            .lean<HostRow[]>();

        return rows.map((row): HostSnapshot => ({
            host_id: row.host_id,
            host_name: row.host_name,
            last_seen: row.last_seen ?? null,
        }));
    }),
};
