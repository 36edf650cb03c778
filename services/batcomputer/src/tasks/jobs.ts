import path from 'node:path';
import { appendFile, mkdir } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { IntelReportRequest } from '../schemas';

export const ACTIVITY_LOG_FILE = 'activity_log.txt';

export interface JobContext {
  log: FastifyBaseLogger;
  delayMs: number;
  activityLogDir: string;
}

/** Alfred appends one line per activity to the Batcomputer log file. */
export async function logActivity(ctx: JobContext, userEmail: string, activity = ''): Promise<void> {
  const line = `User ${userEmail} activity: ${activity}\n`;
  ctx.log.info({ userEmail, activity }, 'Logging activity');
  await sleep(ctx.delayMs);

  await mkdir(ctx.activityLogDir, { recursive: true });
  const file = path.join(ctx.activityLogDir, ACTIVITY_LOG_FILE);
  await appendFile(file, line, 'utf8');
  ctx.log.info({ file, userEmail }, 'Activity logged');
}

export async function compileIntelReport(ctx: JobContext, request: IntelReportRequest): Promise<void> {
  const { report_name, recipient_email } = request;
  ctx.log.info({ report_name, recipient_email }, 'Compiling intel report');
  await sleep(ctx.delayMs);
  ctx.log.info({ report_name, recipient_email }, 'Intel report compiled');
}
