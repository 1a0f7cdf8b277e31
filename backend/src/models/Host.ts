import mongoose, { Schema, Document } from 'mongoose';

export interface IHost extends Document {
    host_id: string; // Opaque identifier assigned at registration
    host_name: string;
    os_name?: string;
    os_version?: string;
    is_active: boolean;
    last_seen?: Date | null;
    created_at: Date;
    updated_at: Date;
}

const HostSchema: Schema = new Schema({
    host_id: { type: String, required: true, unique: true },
    host_name: { type: String, required: true, unique: true },
    os_name: { type: String },
    os_version: { type: String },
    is_active: { type: Boolean, default: true },
    last_seen: { type: Date, default: null },
}, { timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } });

HostSchema.index({ is_active: 1, host_id: 1 });

export default mongoose.model<IHost>('Host', HostSchema);
