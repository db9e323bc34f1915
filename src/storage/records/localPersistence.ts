import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import { FileIOError, describeError } from '../../errors.js';
import { logger } from '../../logger.js';
import { SerialQueue } from '../../utils/serialQueue.js';
import { decodeTable, encodeTable } from './tableCodec.js';
import { numberRecords, validateSnapshot, type Snapshot } from './schema.js';

const WORKSHEET_NAME = 'Applications';
const CORRUPT_SUFFIX = '.corrupt';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function cellText(cell: ExcelJS.Cell): unknown {
  const value = cell.value;
  if (value instanceof Date || value === null || value === undefined) {
    return value;
  }
  return cell.text;
}

/**
 * Durable workbook holding the full application table.
 */
export class LocalPersistence {
  readonly filePath: string;
  private readonly saves = new SerialQueue();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Where a workbook that failed to load is copied before starting empty.
   */
  get corruptBackupPath(): string {
    return this.filePath + CORRUPT_SUFFIX;
  }

  /**
   * Read the workbook. A missing file is an empty table; an unreadable one is
   * logged, copied aside and also treated as empty.
   */
  async load(): Promise<Snapshot> {
    try {
      await fs.access(this.filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info(`No data file at ${this.filePath}; starting with an empty table.`);
        return [];
      }
      logger.error(`Could not access data file ${this.filePath}: ${describeError(error)}`);
      return [];
    }

    try {
      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.readFile(this.filePath);

      const sheet = workbook.getWorksheet(WORKSHEET_NAME) ?? workbook.worksheets[0];
      if (!sheet) {
        return [];
      }

      const rows: unknown[][] = [];
      for (let r = 1; r <= sheet.rowCount; r++) {
        const row = sheet.getRow(r);
        const cells: unknown[] = [];
        for (let c = 1; c <= sheet.columnCount; c++) {
          cells.push(cellText(row.getCell(c)));
        }
        rows.push(cells);
      }

      const records = numberRecords(decodeTable(rows));
      logger.debug(`Loaded ${records.length} applications from ${this.filePath}`);
      return records;
    } catch (error) {
      logger.error(`Could not read data file ${this.filePath}: ${describeError(error)}`);
      await this.backupCorruptFile();
      return [];
    }
  }

  /**
   * Queue a full-table write. Saves run strictly in call order; each writes a
   * temporary file in the same directory and renames it over the target.
   */
  save(snapshot: Snapshot): Promise<void> {
    return this.saves.enqueue(() => this.writeAtomically(encodeTable(validateSnapshot(snapshot))));
  }

  /**
   * Resolves once every queued save has settled.
   */
  flush(): Promise<void> {
    return this.saves.onIdle();
  }

  private async writeAtomically(rows: string[][]): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });

      const workbook = new ExcelJS.Workbook();
      workbook.creator = 'apptrack';
      const sheet = workbook.addWorksheet(WORKSHEET_NAME);
      sheet.addRows(rows);
      sheet.getRow(1).font = { bold: true };

      await workbook.xlsx.writeFile(tempPath);
      await fs.rename(tempPath, this.filePath);
      logger.debug(`Saved ${rows.length - 1} applications to ${this.filePath}`);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn(`Could not remove temporary file ${tempPath}: ${describeError(cleanupError)}`);
      });
      throw new FileIOError(
        `Could not save applications to ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
  }

  private async backupCorruptFile(): Promise<void> {
    try {
      await fs.copyFile(this.filePath, this.corruptBackupPath);
      logger.warn(`Unreadable data file copied to ${this.corruptBackupPath}`);
    } catch (error) {
      logger.error(`Could not back up unreadable data file: ${describeError(error)}`);
    }
  }
}
