// src/tests/SheetImportService.test.ts
import * as path from 'path';
import { DEFAULT_LABELS } from '../config/app-config';
import { MissingRequiredField } from '../errors/InterpretationErrors';
import { ScalarType } from '../models/Scalar';
import { SheetImportService } from '../services/SheetImportService';
import { TemplateRepository } from '../services/TemplateRepository';

const FIXTURES = path.join(__dirname, 'fixtures');
const sheet = (file: string) => path.join(FIXTURES, 'sheets', file);

describe('SheetImportService', () => {
  const service = new SheetImportService(new TemplateRepository(path.join(FIXTURES, 'templates')));

  it('should import a raw sheet with a template', async () => {
    const dataSheet = await service.importSheet(sheet('word-prompting.raw.json'), {
      template: 'word-prompting',
      format: 'raw'
    });

    expect(dataSheet.studentKey).toBe('JA');
    expect(dataSheet.tables).toHaveLength(1);
    expect(dataSheet.tables[0].data.map(row => row['Word'].value)).toEqual(['Ball', 'Cup']);
    expect(dataSheet.scalars.get('Total Repetitions')?.toJSON()).toEqual({
      key: 'Total Repetitions',
      value: '6',
      type: ScalarType.INT,
      choiceOptions: []
    });
  });

  it('should import a Textract response', async () => {
    const dataSheet = await service.importSheet(sheet('session.textract.json'), {
      template: 'yes-no-tally',
      format: 'textract'
    });

    expect(dataSheet.studentKey).toBe('BK');
    expect(dataSheet.tables[0].data.map(row => row['Tally'].value)).toEqual(['Y', 'N', 'N', 'Y']);
  });

  it('should import labeled text', async () => {
    const dataSheet = await service.importSheet(sheet('session.txt'), {
      template: 'word-prompting',
      format: 'text',
      labels: DEFAULT_LABELS
    });

    expect(dataSheet.timeIn).toBe('11:00 AM');
    expect(dataSheet.tables).toEqual([]);
    expect(dataSheet.scalars.size).toBe(0);
  });

  it('should stop at the first failure by default', async () => {
    await expect(
      service.importMany([sheet('missing-date.raw.json'), sheet('tally.raw.json')], {
        template: 'yes-no-tally',
        format: 'raw'
      })
    ).rejects.toBeInstanceOf(MissingRequiredField);
  });

  it('should collect failures when continuing on error', async () => {
    const results = await service.importMany([sheet('tally.raw.json'), sheet('missing-date.raw.json')], {
      template: 'yes-no-tally',
      format: 'raw',
      continueOnError: true
    });

    expect(results.map(result => result.success)).toEqual([true, false]);
    const failed = results[1];
    if (failed.success) {
      throw new Error('Expected the second import to fail');
    }
    expect(failed.location).toBe(sheet('missing-date.raw.json'));
    expect(failed.error).toBeInstanceOf(MissingRequiredField);
  });
});
