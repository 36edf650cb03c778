import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../contracts/appContext';
import { activityQuerySchema, emailParam, intelReportSchema } from '../schemas';
import { compileIntelReport, logActivity } from '../tasks/jobs';
import { parseInput } from '../validation';

const activityParams = z.object({ user_email: emailParam });

/** Work handed to Alfred: queued during the request, run after the response. */
export async function registerTaskRoutes(app: FastifyInstance, ctx: AppContext) {
  app.post('/log-activity/:user_email', async (req) => {
    const { user_email } = parseInput(activityParams, req.params);
    const { activity_description } = parseInput(activityQuerySchema, req.query);

    app.backgroundTasks(req).add('logActivity', logActivity, ctx.jobs, user_email, activity_description);
    return { message: `Activity logging initiated for ${user_email}.` };
  });

  app.post('/request-intel-report', async (req) => {
    const report = parseInput(intelReportSchema, req.body);

    app.backgroundTasks(req).add('compileIntelReport', compileIntelReport, ctx.jobs, report);
    return {
      message: `Intel report '${report.report_name}' compilation requested for ${report.recipient_email}. Alfred is on it.`,
    };
  });
}
