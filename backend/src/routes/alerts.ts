import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError, ConflictError, ValidationError, toHttpError } from '../lib/errors';
import { AlertRepository } from '../repositories';

const activeQuerySchema = z.object({
    host_id: z.string().trim().min(1).optional(),
});

const historyQuerySchema = z.object({
    host_id: z.string().trim().min(1),
    check_key: z.string().trim().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function createAlertRoutes(alerts: AlertRepository, now: () => Date = () => new Date()) {
    const router = Router();

    // Active (open or acknowledged) alerts, newest first
    router.get('/active', async (req, res) => {
        try {
            const parsed = activeQuerySchema.safeParse(req.query);
            if (!parsed.success) {
                throw new ValidationError('Invalid query', { issues: parsed.error.issues });
            }
            res.json(await alerts.listActive(parsed.data.host_id));
        } catch (error) {
            const { status, body } = toHttpError(error, 'Failed to fetch active alerts');
            if (status >= 500) console.error('[AlertsAPI] Failed to fetch active alerts:', error);
            res.status(status).json(body);
        }
    });

    router.get('/history', async (req, res) => {
        try {
            const parsed = historyQuerySchema.safeParse(req.query);
            if (!parsed.success) {
                throw new ValidationError('host_id is required; limit must be between 1 and 500', { issues: parsed.error.issues });
            }
            res.json(await alerts.listHistory(parsed.data));
        } catch (error) {
            const { status, body } = toHttpError(error, 'Failed to fetch alert history');
            if (status >= 500) console.error('[AlertsAPI] Failed to fetch alert history:', error);
            res.status(status).json(body);
        }
    });

    // Operator acknowledgement; the engine never produces this status
    router.post('/:id/acknowledge', async (req, res) => {
        try {
            const updated = await alerts.acknowledge(req.params.id, now());
            if (!updated) {
                const existing = await alerts.findById(req.params.id);
                if (!existing) throw new NotFoundError('Alert not found');
                throw new ConflictError(`Alert is ${existing.status}; only open alerts can be acknowledged`);
            }
            res.json(updated);
        } catch (error) {
            const { status, body } = toHttpError(error, 'Failed to acknowledge alert');
            if (status >= 500) console.error('[AlertsAPI] Failed to acknowledge alert:', error);
            res.status(status).json(body);
        }
    });

    return router;
}
