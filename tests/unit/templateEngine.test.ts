import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { HandlebarsRenderer } from '../../src/services/templateEngine';
import type { TemplateRef } from '../../src/types/notification';
import { RenderError } from '../../src/utils/errors';

const TEMPLATES_DIR = path.join(__dirname, '..', 'fixtures', 'templates');

const template = (overrides: Partial<TemplateRef>): TemplateRef => ({
  id: 't1',
  name: 'Test',
  path: null,
  body: null,
  html: false,
  ...overrides,
});

describe('HandlebarsRenderer', () => {
  let renderer: HandlebarsRenderer;

  beforeEach(() => {
    renderer = new HandlebarsRenderer(TEMPLATES_DIR);
  });

  it('renders a plain-text file template without escaping', async () => {
    const out = await renderer.render(template({ path: 'job-reminder.hbs' }), {
      first_name: 'Ada',
      job_name: 'Cake & Portraits',
      location: '<Gym>',
    });
    expect(out).toBe('Hi Ada, Cake & Portraits starts at <Gym>.\n');
  });

  it('escapes values in html templates', async () => {
    const out = await renderer.render(template({ path: 'greeting.html.hbs', html: true }), { name: '<b>Bo</b>' });
    expect(out).toBe('<p>Hello &lt;b&gt;Bo&lt;/b&gt;</p>');
  });

  it('renders null context values as empty', async () => {
    const out = await renderer.render(template({ body: '[{{missing}}]' }), { missing: null });
    expect(out).toBe('[]');
  });

  it('formats dates with the formatDate helper', async () => {
    const t = template({ body: '{{formatDate when}}|{{formatDate other}}' });
    const out = await renderer.render(t, { when: new Date('2025-03-10T12:00:00.000Z'), other: 'soon' });
    expect(out).toMatch(/^Mar 10, 2025, .+\|$/);
  });

  it('picks up an edited inline body for the same template', async () => {
    await expect(renderer.render(template({ body: 'first' }), {})).resolves.toBe('first');
    await expect(renderer.render(template({ body: 'second' }), {})).resolves.toBe('second');
  });

  it('compiles the same source separately for html and text', async () => {
    const body = '{{name}}';
    await expect(renderer.render(template({ body }), { name: 'a&b' })).resolves.toBe('a&b');
    await expect(renderer.render(template({ body, html: true }), { name: 'a&b' })).resolves.toBe('a&amp;b');
  });

  it('picks up an edited template file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'templates-'));
    try {
      const local = new HandlebarsRenderer(dir);
      await writeFile(path.join(dir, 'note.hbs'), 'v1 {{n}}');
      await expect(local.render(template({ path: 'note.hbs' }), { n: 1 })).resolves.toBe('v1 1');

      await writeFile(path.join(dir, 'note.hbs'), 'v2 {{n}}');
      await expect(local.render(template({ path: 'note.hbs' }), { n: 1 })).resolves.toBe('v2 1');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('fails when the template file is missing', async () => {
    await expect(renderer.render(template({ name: 'Gone', path: 'gone.hbs' }), {})).rejects.toThrow(
      new RenderError('Template Gone not found at gone.hbs')
    );
  });

  it('refuses paths outside the templates directory', async () => {
    await expect(renderer.render(template({ path: '../support/fixtures.ts' }), {})).rejects.toThrow(
      'Template Test points outside the templates directory'
    );
  });

  it('fails when a template has neither a path nor a body', async () => {
    await expect(renderer.render(template({}), {})).rejects.toBeInstanceOf(RenderError);
  });

  it('wraps syntax errors', async () => {
    await expect(renderer.render(template({ body: '{{#if}}' }), {})).rejects.toThrow(
      /^Template Test failed to render: /
    );
  });
});
