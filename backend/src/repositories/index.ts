import { mongoAlertRepository } from './alertRepository';
import { mongoCheckConfigRepository } from './checkConfigRepository';
import { mongoHostRepository } from './hostRepository';
import { mongoReadingRepository } from './readingRepository';
import { EngineRepositories } from './types';

export * from './types';

export const createMongoRepositories = (): EngineRepositories => ({
    hosts: mongoHostRepository,
    readings: mongoReadingRepository,
    checks: mongoCheckConfigRepository,
    alerts: mongoAlertRepository,
});
