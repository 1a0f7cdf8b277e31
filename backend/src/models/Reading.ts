import mongoose, { Schema, Document } from 'mongoose';

export interface IReading extends Document {
    host_id: string;
    collected_at: Date;
    cpu_pct?: number | null;
    mem_pct?: number | null;
    mem_used_mb?: number | null;
    mem_total_mb?: number | null;
    disk_pct?: number | null;
    disk_used_gb?: number | null;
    disk_total_gb?: number | null;
    int_ip?: string;
    public_ip?: string;
    extra?: Record<string, unknown>;
    created_at: Date;
}

// Written by the ingestion endpoint; the alert engine only reads the newest row per host.
const ReadingSchema: Schema = new Schema({
    host_id: { type: String, required: true },
    collected_at: { type: Date, required: true },
    cpu_pct: { type: Number, default: null },
    mem_pct: { type: Number, default: null },
    mem_used_mb: { type: Number, default: null },
    mem_total_mb: { type: Number, default: null },
    disk_pct: { type: Number, default: null },
    disk_used_gb: { type: Number, default: null },
    disk_total_gb: { type: Number, default: null },
    int_ip: { type: String },
    public_ip: { type: String },
    extra: { type: Schema.Types.Mixed },
}, { timestamps: { createdAt: 'created_at', updatedAt: false } });

ReadingSchema.index({ host_id: 1, collected_at: -1 });

// TTL Index: Keep readings for 30 days
ReadingSchema.index({ collected_at: 1 }, { expireAfterSeconds: 2592000 });

export default mongoose.model<IReading>('Reading', ReadingSchema);
