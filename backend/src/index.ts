import dotenv from 'dotenv';
import mongoose from 'mongoose';
import { createServer } from 'http';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { createMongoRepositories } from './repositories';
import { seedCheckTypes } from './seedChecks';
import { AlertingEngine } from './services/AlertingEngine';
import { AlertScheduler } from './services/alertScheduler';

dotenv.config();

const loadConfigOrExit = (): AppConfig => {
    try {
        return loadConfig();
    } catch (error) {
        console.error('Failed to load configuration', error);
        process.exit(1);
    }
};

const { port, mongodbUri, sweepIntervalSeconds, engineEnabled } = loadConfigOrExit();

const repositories = createMongoRepositories();
const engine = new AlertingEngine(repositories);
const scheduler = new AlertScheduler(engine, sweepIntervalSeconds);
const httpServer = createServer(createApp({ alerts: repositories.alerts, scheduler }));

let shuttingDown = false;

const shutdown = async (signal: string) => {
    if (shuttingDown) {
        console.log(`${signal} received, shutdown already in progress`);
        return;
    }
    shuttingDown = true;
    console.log(`${signal} received, shutting down...`);
    try {
        await scheduler.stop();
        await new Promise<void>((resolve) => httpServer.close(() => resolve()));
        await mongoose.disconnect();
        process.exit(0);
    } catch (error) {
        console.error('Error during shutdown', error);
        process.exit(1);
    }
};

mongoose.connect(mongodbUri)
    .then(async () => {
        console.log('Connected to MongoDB');

        await seedCheckTypes();

        httpServer.listen(port, () => {
            console.log(`Server is running on port ${port}`);
        });

        if (engineEnabled) {
            scheduler.start();
        } else {
            console.log('Alert evaluation engine disabled (ALERT_ENGINE_ENABLED=false)');
        }

        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
    })
    .catch((err) => {
        console.error('Failed to connect to MongoDB', err);
        process.exit(1);
    });
