import path from 'path';
import { readFile } from 'fs/promises';
import Handlebars from 'handlebars';
import { config } from '../config';
import type { TemplateRef } from '../types/notification';
import { RenderError } from '../utils/errors';

export interface TemplateRenderer {
  render(template: TemplateRef, context: Record<string, unknown>): Promise<string>;
}

const handlebars = Handlebars.create();

/**
 * {{formatDate Job.start_time}} -> "Mar 4, 2025, 9:30 AM"
 */
handlebars.registerHelper('formatDate', (value: unknown) => {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) return '';
  return new Intl.DateTimeFormat('en-US', { dateStyle: 'medium', timeStyle: 'short' }).format(value);
});

/**
 * Renders a NotificationTemplate with Handlebars. File-backed templates are
 * read from the templates directory; inline bodies come from the document.
 * Compiled templates are cached per process, keyed by their source text, so
 * an edited body or file takes effect on the next render.
 */
export class HandlebarsRenderer implements TemplateRenderer {
  private readonly compiled = new Map<string, Handlebars.TemplateDelegate>();

  constructor(private readonly templatesDir: string = config.templates.dir) {}

  private async source(template: TemplateRef): Promise<string> {
    if (template.path) {
      const root = path.resolve(this.templatesDir);
      const file = path.resolve(root, template.path);
      if (file !== root && !file.startsWith(root + path.sep)) {
        throw new RenderError(`Template ${template.name} points outside the templates directory`);
      }
      try {
        return await readFile(file, 'utf8');
      } catch {
        throw new RenderError(`Template ${template.name} not found at ${template.path}`);
      }
    }
    if (template.body !== null) return template.body;
    throw new RenderError(`Template ${template.name} has neither a path nor a body`);
  }

  private async compile(template: TemplateRef): Promise<Handlebars.TemplateDelegate> {
    const source = await this.source(template);
    const key = `${template.html ? 'html' : 'text'}:${source}`;
    const cached = this.compiled.get(key);
    if (cached) return cached;

    const delegate = handlebars.compile(source, { noEscape: !template.html });
    this.compiled.set(key, delegate);
    return delegate;
  }

  async render(template: TemplateRef, context: Record<string, unknown>): Promise<string> {
    const delegate = await this.compile(template);
    try {
      return delegate(context);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RenderError(`Template ${template.name} failed to render: ${reason}`);
    }
  }
}
