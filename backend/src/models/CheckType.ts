import mongoose, { Schema, Document } from 'mongoose';
import { ALERT_SEVERITIES, AlertSeverity, CheckParams } from '../types';

export interface ICheckType extends Document {
    check_key: string; // short key the evaluators are registered under, e.g. 'disk_space'
    check_name: string;
    params: CheckParams;
    severity: AlertSeverity;
    cooldown_minutes: number; // minimum gap between notification refreshes
    enabled: boolean;
    notes?: string;
    created_at: Date;
    updated_at: Date;
}

const CheckTypeSchema = new Schema<ICheckType>({
    check_key: { type: String, required: true, unique: true },
    check_name: { type: String, required: true, unique: true },
    params: { type: Schema.Types.Mixed, default: {} },
    severity: { type: String, enum: ALERT_SEVERITIES, required: true, default: 'L1' },
    cooldown_minutes: { type: Number, required: true, default: 60, min: 0 },
    enabled: { type: Boolean, default: true },
    notes: { type: String },
}, { timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' }, minimize: false });

export default mongoose.model<ICheckType>('CheckType', CheckTypeSchema);
