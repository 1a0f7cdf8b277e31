import { getCheckEvaluator, CheckEvaluator, CheckVerdict } from '../checks/evaluators';
import { AlertIntegrityError, CheckConfigError, describeError } from '../lib/errors';
import { EngineRepositories } from '../repositories';
import { EnabledCheck, HostSnapshot, LatestReading } from '../types';

export type CheckOutcomeKind = 'triggered' | 'ongoing' | 'resolved' | 'ok' | 'no_data' | 'skipped' | 'error';

export interface CheckOutcome {
    check_key: string;
    outcome: CheckOutcomeKind;
    message: string;
    alert_id?: string;
    notification_refreshed?: boolean;
}

export interface HostSweepResult {
    host_id: string;
    host_name: string;
    checks: CheckOutcome[];
    error?: string;
}

export interface SweepReport {
    started_at: Date;
    finished_at: Date;
    aborted: boolean;
    hosts_checked: number;
    checks_run: number;
    alerts_triggered: number;
    alerts_resolved: number;
    notifications_refreshed: number;
    skipped: number;
    errors: number;
    details: HostSweepResult[];
}

export interface AlertingEngineOptions {
    now?: () => Date;
    evaluators?: (checkKey: string) => CheckEvaluator | null;
}

/**
 * Reconciles alert state for every active host. Current state is never held
 * in memory: a pair is "alerting" exactly when the store has an active
 * (open or acknowledged) record for it.
 */
export class AlertingEngine {
    private readonly now: () => Date;
    private readonly resolveEvaluator: (checkKey: string) => CheckEvaluator | null;

    constructor(private readonly repos: EngineRepositories, options: AlertingEngineOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.resolveEvaluator = options.evaluators ?? getCheckEvaluator;
    }

    /**
     * One sweep over all active hosts. Failures are scoped to the host or
     * pair they happen in; only a failure to list hosts rejects.
     */
    async runSweep(signal?: AbortSignal): Promise<SweepReport> {
        const startedAt = this.now();
        const hosts = await this.repos.hosts.findActiveHosts();

        const report: SweepReport = {
            started_at: startedAt,
            finished_at: startedAt,
            aborted: false,
            hosts_checked: 0,
            checks_run: 0,
            alerts_triggered: 0,
            alerts_resolved: 0,
            notifications_refreshed: 0,
            skipped: 0,
            errors: 0,
            details: [],
        };

        for (const host of hosts) {
            if (signal?.aborted) {
                report.aborted = true;
                console.log(`[AlertEngine] Sweep aborted after ${report.hosts_checked}/${hosts.length} hosts`);
                break;
            }

            const result = await this.evaluateHost(host, startedAt);
            report.hosts_checked += 1;
            report.details.push(result);
            if (result.error) report.errors += 1;

            for (const check of result.checks) {
                if (check.outcome !== 'skipped' && check.outcome !== 'error') report.checks_run += 1;
                if (check.outcome === 'triggered') report.alerts_triggered += 1;
                if (check.outcome === 'resolved') report.alerts_resolved += 1;
                if (check.outcome === 'skipped') report.skipped += 1;
                if (check.outcome === 'error') report.errors += 1;
                if (check.notification_refreshed) report.notifications_refreshed += 1;
            }
        }

        report.finished_at = this.now();
        return report;
    }

    async evaluateHost(host: HostSnapshot, now: Date): Promise<HostSweepResult> {
        const result: HostSweepResult = { host_id: host.host_id, host_name: host.host_name, checks: [] };

        let checks: EnabledCheck[];
        let reading: LatestReading | null;
        try {
            checks = await this.repos.checks.findEnabledChecksForHost(host.host_id);
            if (checks.length === 0) return result;
            reading = await this.repos.readings.findLatestForHost(host.host_id);
        } catch (error) {
            result.error = describeError(error);
            console.error(`[AlertEngine] Failed to load state for host ${host.host_name} (${host.host_id}):`, error);
            return result;
        }

        for (const check of checks) {
            result.checks.push(await this.evaluatePair(host, reading, check, now));
        }
        return result;
    }

    private async evaluatePair(
        host: HostSnapshot,
        reading: LatestReading | null,
        check: EnabledCheck,
        now: Date
    ): Promise<CheckOutcome> {
        const pair = `${host.host_name}/${check.check_key}`;

        try {
            const evaluator = this.resolveEvaluator(check.check_key);
            if (!evaluator) {
                throw new CheckConfigError(`Unknown check kind '${check.check_key}'`, { check_key: check.check_key });
            }

            const prepared = evaluator.prepare(check.default_params, check.override_params);
            const verdict = prepared.evaluate({ host, reading, now });
            if (!verdict) {
                return { check_key: check.check_key, outcome: 'no_data', message: `No data available for ${check.check_name}` };
            }

            const readingId = prepared.usesReading && reading ? reading.reading_id : null;
            return await this.reconcile(host, check, verdict, readingId, now);
        } catch (error) {
            if (error instanceof CheckConfigError) {
                console.warn(`[AlertEngine] Skipping ${pair}: ${error.message}`);
                return { check_key: check.check_key, outcome: 'skipped', message: error.message };
            }
            if (error instanceof AlertIntegrityError) {
                console.error(`[AlertEngine] INTEGRITY VIOLATION for ${pair}: ${error.message}`);
                return { check_key: check.check_key, outcome: 'error', message: error.message };
            }
            console.error(`[AlertEngine] Error evaluating ${pair}:`, error);
            return { check_key: check.check_key, outcome: 'error', message: describeError(error) };
        }
    }

    private async reconcile(
        host: HostSnapshot,
        check: EnabledCheck,
        verdict: CheckVerdict,
        readingId: string | null,
        now: Date
    ): Promise<CheckOutcome> {
        const { alerts } = this.repos;
        const active = await alerts.findActive(host.host_id, check.check_key);

        if (verdict.alerting && !active) {
            const created = await alerts.openAlert({
                host_id: host.host_id,
                check_key: check.check_key,
                severity: check.severity,
                reading_id: readingId,
                message: verdict.message,
                triggered_at: now,
            });
            console.log('[AlertEngine] Trigger', { host: host.host_id, check: check.check_key, severity: check.severity, alert_id: created.alert_id });
            return { check_key: check.check_key, outcome: 'triggered', message: verdict.message, alert_id: created.alert_id };
        }

        if (verdict.alerting && active) {
            const refreshed = await alerts.touchNotified(active.alert_id, now, check.cooldown_minutes);
            return {
                check_key: check.check_key,
                outcome: 'ongoing',
                message: verdict.message,
                alert_id: active.alert_id,
                notification_refreshed: refreshed,
            };
        }

        if (active) {
            const resolved = await alerts.resolveAlert(active.alert_id, `${active.message} → RESOLVED: ${verdict.message}`, now);
            if (!resolved) {
                // Another writer closed it between our read and write
                return { check_key: check.check_key, outcome: 'ok', message: verdict.message };
            }
            console.log('[AlertEngine] Recovery', { host: host.host_id, check: check.check_key, alert_id: resolved.alert_id });
            return { check_key: check.check_key, outcome: 'resolved', message: verdict.message, alert_id: resolved.alert_id };
        }

        return { check_key: check.check_key, outcome: 'ok', message: verdict.message };
    }
}

export const formatSweepSummary = (report: SweepReport) => {
    const durationMs = report.finished_at.getTime() - report.started_at.getTime();
    return `hosts=${report.hosts_checked} checks=${report.checks_run} triggered=${report.alerts_triggered} ` +
        `resolved=${report.alerts_resolved} refreshed=${report.notifications_refreshed} ` +
        `skipped=${report.skipped} errors=${report.errors} duration=${durationMs}ms${report.aborted ? ' (aborted)' : ''}`;
};
