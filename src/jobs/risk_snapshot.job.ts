/**
 * RISK SNAPSHOT CRON JOB
 * ======================
 *
 * Fires the runner at fixed wall-clock times in the market's timezone.
 * Several expressions may be given, separated by ';'. A firing that lands
 * while a run is still in flight is skipped by the runner itself.
 */

import cron from 'node-cron';
import type { SnapshotRunnerService } from '../modules/risk-snapshot/services/snapshot.runner.service.js';
import { errorMessage } from '../common/errors.js';

export interface RiskSnapshotJobOptions {
  schedule: string;
  timezone: string;
}

export interface RiskSnapshotJobHandle {
  expressions: string[];
  stop: () => void;
}

export function parseSchedule(schedule: string): string[] {
  const expressions = schedule.split(';').map(s => s.trim()).filter(Boolean);
  for (const expr of expressions) {
    if (!cron.validate(expr)) throw new Error(`[RiskSnapshot Cron] Invalid cron expression: "${expr}"`);
  }
  return expressions;
}

export function startRiskSnapshotJob(
  runner: SnapshotRunnerService,
  options: RiskSnapshotJobOptions,
): RiskSnapshotJobHandle {
  const expressions = parseSchedule(options.schedule);

  const tasks = expressions.map(expr =>
    cron.schedule(expr, async () => {
      try {
        const outcome = await runner.run();
        console.log(`[RiskSnapshot Cron] ${expr} → ${outcome.status} (${outcome.runId})`);
      } catch (e) {
        console.error('[RiskSnapshot Cron] Error:', errorMessage(e));
      }
    }, { timezone: options.timezone }),
  );

  console.log(`[RiskSnapshot] Cron started (${expressions.join(' | ')}, ${options.timezone})`);

  return {
    expressions,
    stop: () => tasks.forEach(t => t.stop()),
  };
}
