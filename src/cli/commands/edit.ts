import chalk from 'chalk';
import { FIELD_COLUMNS } from '../../storage/records/index.js';
import { formatRecordDetails, parseFieldName, parseRowNumber } from '../format.js';
import { withEngine } from '../session.js';

export async function editCommand(rowNumber: string, fieldName: string, value: string): Promise<void> {
  await withEngine(engine => {
    const id = parseRowNumber(rowNumber);
    const field = parseFieldName(fieldName);
    const before = engine.get(id)[field];

    engine.update(id, field, value);

    const after = engine.get(id);
    if (after[field] === before) {
      console.log(chalk.gray(`\n  ${FIELD_COLUMNS[field]} is already "${before}". No changes made.\n`));
      return;
    }

    console.log(chalk.green(`\n  ✓ Updated ${FIELD_COLUMNS[field]} of #${id + 1}\n`));
    for (const line of formatRecordDetails(after)) {
      console.log(line);
    }
    console.log('');
  });
}
