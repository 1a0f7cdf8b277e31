import { Router } from 'express';
import { toHttpError } from '../lib/errors';
import { AlertScheduler } from '../services/alertScheduler';

export function createEngineRoutes(scheduler: AlertScheduler) {
    const router = Router();

    router.get('/status', (req, res) => {
        res.json(scheduler.getStatus());
    });

    // Manual sweep, serialised with the scheduled ones
    router.post('/sweep', async (req, res) => {
        try {
            res.json(await scheduler.runNow());
        } catch (error) {
            const { status, body } = toHttpError(error, 'Sweep failed');
            if (status >= 500) console.error('[EngineAPI] Sweep failed:', error);
            res.status(status).json(body);
        }
    });

    return router;
}
