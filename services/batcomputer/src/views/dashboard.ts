import path from 'node:path';
import { access } from 'node:fs/promises';
import type { FastifyReply } from 'fastify';
import { ServerError } from '../errors';

export const TEMPLATES = {
  batcave: 'index.hbs',
  contacts: 'contacts_list.hbs',
  gauntlet: 'gauntlet.hbs',
  characters: 'characters_list.hbs',
} as const;

export type TemplateName = (typeof TEMPLATES)[keyof typeof TEMPLATES];

/**
 * Renders a handlebars template through @fastify/view. The template file is
 * looked up first so a missing one becomes a 500 with a readable detail.
 */
export class DashboardRenderer {
  constructor(private readonly templatesDir: string) {}

  async render(reply: FastifyReply, template: TemplateName, context: Record<string, unknown>) {
    try {
      await access(path.join(this.templatesDir, template));
    } catch {
      throw new ServerError(`Template '${template}' not found.`);
    }
    return reply.view(template, context);
  }
}
