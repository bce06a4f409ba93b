// src/tests/TemplateRepository.test.ts
import * as path from 'path';
import { InvalidTemplateConfiguration, TemplateNotFound } from '../errors/InterpretationErrors';
import { ScalarType } from '../models/Scalar';
import { TemplateRepository } from '../services/TemplateRepository';
import { SESSION_FORM_DATA, sheetContent } from './helpers';

const TEMPLATES_DIR = path.join(__dirname, 'fixtures', 'templates');
const BROKEN_TEMPLATE = path.join(__dirname, 'fixtures', 'broken-template.json');

describe('TemplateRepository', () => {
  const repository = new TemplateRepository(TEMPLATES_DIR);

  it('should load every JSON template in file name order', async () => {
    const templates = await repository.loadAll();

    expect(templates.map(template => template.id)).toEqual(['word-prompting', 'yes-no-tally']);
    expect(templates[0].configs).toEqual([
      { type: 'table', columns: ['Word', 'Times Prompted', 'Times w/out Prompt'] },
      { type: 'simple_form', fields: { 'Total Repetitions': ScalarType.INT, 'Reinforcer Used': ScalarType.BOOLEAN } }
    ]);
  });

  it('should find a template by id', async () => {
    const template = await repository.find('yes-no-tally');

    expect(template.name).toBe('Yes / No tally');
    expect(template.fileLocation).toBe(path.join(TEMPLATES_DIR, 'yes-no-tally.json'));
  });

  it('should load a template from a path', async () => {
    const template = await repository.find(path.join(TEMPLATES_DIR, 'word-prompting.json'));

    expect(template.id).toBe('word-prompting');
  });

  it('should build a working interpreter', async () => {
    const template = await repository.find('yes-no-tally');
    const dataSheet = template.interpreter.interpret(sheetContent({ ...SESSION_FORM_DATA }, [['Y', 'N'], ['Y', 'Y']]));

    expect(dataSheet.tables[0].data.map(row => row['Tally'].value)).toEqual(['Y', 'N', 'Y', 'Y']);
  });

  it('should fail for unknown templates', async () => {
    await expect(repository.find('unknown')).rejects.toBeInstanceOf(TemplateNotFound);
    await expect(repository.find('missing.json')).rejects.toBeInstanceOf(TemplateNotFound);
  });

  it('should report invalid templates with zod issues', async () => {
    await expect(repository.find(BROKEN_TEMPLATE)).rejects.toMatchObject({
      source: BROKEN_TEMPLATE,
      issues: ['interpreters.0.configuration.choice_options: CHOICE tallies need at least one choice option']
    });
    await expect(repository.loadFile(BROKEN_TEMPLATE)).rejects.toBeInstanceOf(InvalidTemplateConfiguration);
  });

  describe('with an invalid file in the directory', () => {
    const mixedDir = path.join(__dirname, 'fixtures', 'mixed-templates');
    const mixed = new TemplateRepository(mixedDir);

    it('should skip the invalid file when listing', async () => {
      const templates = await mixed.loadAll();

      expect(templates.map(template => template.id)).toEqual(['yes-no-tally']);
    });

    it('should still find the valid templates', async () => {
      const template = await mixed.find('yes-no-tally');

      expect(template.fileLocation).toBe(path.join(mixedDir, 'yes-no-tally.json'));
    });

    it('should report the load error when the invalid file is requested by name', async () => {
      await expect(mixed.find('a-broken')).rejects.toMatchObject({
        code: 'INVALID_TEMPLATE_CONFIGURATION',
        source: path.join(mixedDir, 'a-broken.json')
      });
    });
  });

  it('should return no templates when the directory is missing', async () => {
    const templates = await new TemplateRepository(path.join(__dirname, 'fixtures', 'nowhere')).loadAll();

    expect(templates).toEqual([]);
  });
});
