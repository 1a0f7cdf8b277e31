import CheckType from '../models/CheckType';
import HostCheckConfig from '../models/HostCheckConfig';
import { AlertSeverity, EnabledCheck } from '../types';
import { withStorage } from './storage';
import { CheckConfigRepository } from './types';

interface HostCheckConfigRow {
    check_key: string;
    params?: unknown;
}

interface CheckTypeRow {
    check_key: string;
    check_name: string;
    params?: unknown;
    severity: AlertSeverity;
    cooldown_minutes: number;
}

export const mongoCheckConfigRepository: CheckConfigRepository = {
    findEnabledChecksForHost: (hostId) => withStorage('checks.findEnabledForHost', async () => {
        const configs = await HostCheckConfig.find({ host_id: hostId, enabled: true })
            .sort({ check_key: 1 })
            .lean<HostCheckConfigRow[]>();
        if (configs.length === 0) return [];

        const types = await CheckType.find({
            check_key: { $in: configs.map((config) => config.check_key) },
            enabled: true,
        }).lean<CheckTypeRow[]>();
        const typesByKey = new Map(types.map((type) => [type.check_key, type]));

        const checks: EnabledCheck[] = [];
        for (const config of configs) {
            // Disabled or missing catalog entries are not evaluated for any host
            const type = typesByKey.get(config.check_key);
            if (!type) continue;

            checks.push({
                check_key: type.check_key,
                check_name: type.check_name,
                severity: type.severity,
                cooldown_minutes: type.cooldown_minutes,
                default_params: type.params ?? null,
                override_params: config.params ?? null,
            });
        }
        return checks;
    }),
};
