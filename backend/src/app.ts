import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { rateLimit } from 'express-rate-limit';
import { createAlertRoutes } from './routes/alerts';
import { createEngineRoutes } from './routes/engine';
import { AlertRepository } from './repositories';
import { AlertScheduler } from './services/alertScheduler';

export interface AppDependencies {
    alerts: AlertRepository;
    scheduler: AlertScheduler;
    now?: () => Date;
}

export function createApp({ alerts, scheduler, now }: AppDependencies) {
    const app = express();

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000, // 15 minutes
        limit: 100, // Limit each IP to 100 requests per `window`
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    app.use(express.json());
    app.use(cors());
    app.use(helmet());
    if (process.env.NODE_ENV !== 'test') {
        app.use(morgan('dev'));
    }
    app.use('/api/', limiter);

    app.use('/api/alerts', createAlertRoutes(alerts, now));
    app.use('/api/engine', createEngineRoutes(scheduler));

    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    return app;
}
