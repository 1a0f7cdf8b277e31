import mongoose, { Schema, Document } from 'mongoose';
import { ACTIVE_ALERT_STATUSES, ALERT_SEVERITIES, ALERT_STATUSES, AlertSeverity, AlertStatus } from '../types';

export interface IAlertRecord extends Document {
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

// Alert records are never deleted; resolved rows form the audit trail.
const AlertRecordSchema = new Schema<IAlertRecord>({
    host_id: { type: String, ref: 'Host', required: true },
    check_key: { type: String, required: true },
    reading_id: { type: String, default: null },
    severity: { type: String, enum: ALERT_SEVERITIES, required: true },
    message: { type: String, required: true },
    status: { type: String, enum: ALERT_STATUSES, required: true, default: 'open' },
    triggered_at: { type: Date, required: true },
    last_notified_at: { type: Date, default: null },
    resolved_at: { type: Date, default: null },
    created_at: { type: Date, default: Date.now },
    updated_at: { type: Date, default: Date.now },
});

// One active (open or acknowledged) alert per (host, check). Needs MongoDB 6.0+ for $in here.
AlertRecordSchema.index(
    { host_id: 1, check_key: 1 },
    { unique: true, partialFilterExpression: { status: { $in: ACTIVE_ALERT_STATUSES } }, name: 'uq_active_alert' }
);
AlertRecordSchema.index({ host_id: 1, status: 1 });
AlertRecordSchema.index({ check_key: 1, status: 1 });
AlertRecordSchema.index({ triggered_at: -1 });

export default mongoose.model<IAlertRecord>('AlertRecord', AlertRecordSchema);
