import * as assert from 'assert';
import { join } from 'path';
import { loadTaskTemplate, renderSystemPrompt } from '../src/services/template.js';
import { TemplateError } from '../src/types/errors.js';
import { TEMPLATE_TEXT, makeTempDir, removeTempDir, writeTemplate } from './helpers.js';

describe('template', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe('loadTaskTemplate', () => {
    it('should read a template with the schema placeholder', async () => {
      const templatePath = writeTemplate(dir);

      assert.strictEqual(await loadTaskTemplate(templatePath), TEMPLATE_TEXT);
    });

    it('should reject a template without the placeholder', async () => {
      const templatePath = writeTemplate(dir, 'Reply in JSON.');

      await assert.rejects(loadTaskTemplate(templatePath), TemplateError);
    });

    it('should reject a missing file', async () => {
      await assert.rejects(loadTaskTemplate(join(dir, 'missing.md')), TemplateError);
    });
  });

  describe('renderSystemPrompt', () => {
    it('should substitute the schema verbatim', () => {
      assert.strictEqual(
        renderSystemPrompt(TEMPLATE_TEXT, 'CREATE TABLE t (a TEXT)'),
        'You turn questions into SQL.\nCREATE TABLE t (a TEXT)\nReply in JSON.'
      );
    });

    it('should substitute every occurrence', () => {
      assert.strictEqual(renderSystemPrompt('{db_schema}|{db_schema}', 'S'), 'S|S');
    });

    it('should keep dollar patterns in the schema literal', () => {
      assert.strictEqual(renderSystemPrompt('[{db_schema}]', "DEFAULT '$&'"), "[DEFAULT '$&']");
    });
  });
});
