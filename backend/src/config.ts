import { z } from 'zod';
import { ConfigError } from './lib/errors';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5001),
    MONGODB_URI: z.string().trim().min(1).default('mongodb://localhost:27017/hostpulse'),
    // Read once at startup; changing it requires restarting the evaluation loop
    ALERT_SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
    ALERT_ENGINE_ENABLED: z.enum(['true', 'false']).default('true'),
});

export interface AppConfig {
    port: number;
    mongodbUri: string;
    sweepIntervalSeconds: number;
    engineEnabled: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, { issues });
    }

    return {
        port: parsed.data.PORT,
        mongodbUri: parsed.data.MONGODB_URI,
        sweepIntervalSeconds: parsed.data.ALERT_SWEEP_INTERVAL_SECONDS,
        engineEnabled: parsed.data.ALERT_ENGINE_ENABLED === 'true',
    };
}
