import mongoose, { Schema, Document } from 'mongoose';
import { CheckParams } from '../types';

export interface IHostCheckConfig extends Document {
    host_id: string;
    check_key: string;
    enabled: boolean;
    params?: CheckParams | null; // per-key overrides of the check type defaults
    created_at: Date;
    updated_at: Date;
}

const HostCheckConfigSchema = new Schema<IHostCheckConfig>({
    host_id: { type: String, ref: 'Host', required: true },
    check_key: { type: String, required: true },
    enabled: { type: Boolean, default: true },
    params: { type: Schema.Types.Mixed, default: null },
}, { timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } });

// At most one config row per (host, check)
HostCheckConfigSchema.index({ host_id: 1, check_key: 1 }, { unique: true });
HostCheckConfigSchema.index({ host_id: 1, enabled: 1 });

export default mongoose.model<IHostCheckConfig>('HostCheckConfig', HostCheckConfigSchema);
