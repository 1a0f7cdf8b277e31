import mongoose, { Types } from 'mongoose';
import AlertRecord from '../models/AlertRecord';
import { ACTIVE_ALERT_STATUSES, AlertRecordView, AlertSeverity, AlertStatus } from '../types';
import { withAlertInsert, withStorage } from './storage';
import { AlertRepository } from './types';

interface AlertRow {
    _id: Types.ObjectId;
    host_id: string;
    check_key: string;
    reading_id?: string | null;
    severity: AlertSeverity;
    message: string;
    status: AlertStatus;
    triggered_at: Date;
    last_notified_at?: Date | null;
    resolved_at?: Date | null;
    created_at: Date;
    updated_at: Date;
}

const MINUTE_MS = 60 * 1000;

const toView = (row: AlertRow): AlertRecordView => ({
    alert_id: String(row._id),
    host_id: row.host_id,
    check_key: row.check_key,
    severity: row.severity,
    reading_id: row.reading_id ?? null,
    message: row.message,
    status: row.status,
    triggered_at: row.triggered_at,
    last_notified_at: row.last_notified_at ?? null,
    resolved_at: row.resolved_at ?? null,
    created_at: row.created_at,
    updated_at: row.updated_at,
});

const toViewOrNull = (row: AlertRow | null) => (row ? toView(row) : null);

export const mongoAlertRepository: AlertRepository = {
    findActive: (hostId, checkKey) => withStorage('alerts.findActive', async () => {
        const row: AlertRow | null = await AlertRecord.findOne({
            host_id: hostId,
            check_key: checkKey,
            status: { $in: ACTIVE_ALERT_STATUSES },
        }).lean<AlertRow>();
        return toViewOrNull(row);
    }),

    findById: (alertId) => withStorage('alerts.findById', async () => {
        if (!mongoose.isValidObjectId(alertId)) return null;
        const row: AlertRow | null = await AlertRecord.findById(alertId).lean<AlertRow>();
        return toViewOrNull(row);
    }),

    openAlert: (input) => withAlertInsert(input.host_id, input.check_key, async () => {
        const doc = await AlertRecord.create({
            host_id: input.host_id,
            check_key: input.check_key,
            reading_id: input.reading_id,
            severity: input.severity,
            message: input.message,
            status: 'open',
            triggered_at: input.triggered_at,
            last_notified_at: input.triggered_at,
            created_at: input.triggered_at,
            updated_at: input.triggered_at,
        });
        return toView(doc.toObject<AlertRow>());
    }),

    resolveAlert: (alertId, message, now) => withStorage('alerts.resolve', async () => {
        const row: AlertRow | null = await AlertRecord.findOneAndUpdate(
            { _id: alertId, status: { $in: ACTIVE_ALERT_STATUSES } },
            { $set: { status: 'resolved', message, resolved_at: now, updated_at: now } },
            { new: true }
        ).lean<AlertRow>();
        return toViewOrNull(row);
    }),

    touchNotified: (alertId, now, cooldownMinutes) => withStorage('alerts.touchNotified', async () => {
        const cutoff = new Date(now.getTime() - cooldownMinutes * MINUTE_MS);
        const result = await AlertRecord.updateOne(
            {
                _id: alertId,
                status: { $in: ACTIVE_ALERT_STATUSES },
                $or: [{ last_notified_at: null }, { last_notified_at: { $lte: cutoff } }],
            },
            { $set: { last_notified_at: now } }
        );
        return result.modifiedCount > 0;
    }),

    acknowledge: (alertId, now) => withStorage('alerts.acknowledge', async () => {
        if (!mongoose.isValidObjectId(alertId)) return null;
        const row: AlertRow | null = await AlertRecord.findOneAndUpdate(
            { _id: alertId, status: 'open' },
            { $set: { status: 'acknowledged', updated_at: now } },
            { new: true }
        ).lean<AlertRow>();
        return toViewOrNull(row);
    }),

    listActive: (hostId) => withStorage('alerts.listActive', async () => {
        const filter: Record<string, unknown> = { status: { $in: ACTIVE_ALERT_STATUSES } };
        if (hostId) filter.host_id = hostId;

        const rows = await AlertRecord.find(filter).sort({ triggered_at: -1 }).lean<AlertRow[]>();
        return rows.map(toView);
    }),

    listHistory: ({ host_id, check_key, limit }) => withStorage('alerts.listHistory', async () => {
        const filter: Record<string, unknown> = { host_id };
        if (check_key) filter.check_key = check_key;

        const rows = await AlertRecord.find(filter).sort({ triggered_at: -1 }).limit(limit).lean<AlertRow[]>();
        return rows.map(toView);
    }),
};
