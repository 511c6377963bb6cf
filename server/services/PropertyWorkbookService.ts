import ExcelJS from 'exceljs';
import { copyFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import {
  getPropertyAddress,
  SCHEDULE_FIELD_MAPPING,
  toFolderName,
  type PropertyRow,
} from '@shared/propertySchedule';
import { logAction } from '../utils/actionLog';

export interface PropertyWorkbookOptions {
  templatePath: string;
  outputDirectory: string;
}

export type WorkbookFiller = Pick<PropertyWorkbookService, 'fill'>;

// The tab that was active when the template was saved, else the first sheet.
export function resolveActiveSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
  const activeTab = workbook.views?.[0]?.activeTab;
  const active =
    typeof activeTab === 'number' && Number.isInteger(activeTab) && activeTab >= 0
      ? workbook.worksheets.at(activeTab)
      : undefined;
  return active ?? workbook.worksheets.at(0);
}

export class PropertyWorkbookService {
  private readonly templatePath: string;
  private readonly outputDirectory: string;

  constructor(options: PropertyWorkbookOptions) {
    this.templatePath = options.templatePath;
    this.outputDirectory = options.outputDirectory;
  }

  public resolveOutputPath(address: string): string {
    const folder = toFolderName(address);
    return path.join(this.outputDirectory, folder, `${folder}.xlsx`);
  }

  /**
   * Copies the schedule template for the row's property and writes the mapped
   * fields into it. Returns null when the row has no address. A missing
   * template rejects with the underlying ENOENT.
   */
  public async fill(row: PropertyRow): Promise<string | null> {
    const address = getPropertyAddress(row);
    if (!address) {
      return null;
    }

    const filePath = this.resolveOutputPath(address);
    await mkdir(path.dirname(filePath), { recursive: true });
    await copyFile(this.templatePath, filePath);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = resolveActiveSheet(workbook);
    if (!sheet) {
      throw new Error(`Template ${this.templatePath} has no worksheets`);
    }

    const written: string[] = [];
    for (const { column, cell } of SCHEDULE_FIELD_MAPPING) {
      const value = row[column];
      if (value === undefined || value === '') {
        continue;
      }
      sheet.getCell(cell).value = value;
      written.push(cell);
    }

    await workbook.xlsx.writeFile(filePath);

    logAction({
      type: 'workbook.generated',
      component: 'PropertyWorkbookService',
      address,
      filePath,
      cells: written.join(','),
    });

    return filePath;
  }
}
