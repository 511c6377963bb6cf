import ExcelJS from 'exceljs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { SCHEDULE_FIELD_MAPPING } from '@shared/propertySchedule';

export const TEMPLATE_SHEET_NAME = 'Schedule';
export const TEMPLATE_PLACEHOLDER = 'TBC';

/**
 * Writes a blank schedule workbook: a title row, one label per mapped field
 * in column A, and a placeholder in each mapped cell.
 */
export async function writeScheduleTemplate(filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'property-schedule';
  const sheet = workbook.addWorksheet(TEMPLATE_SHEET_NAME);
  sheet.getColumn(1).width = 28;
  sheet.getColumn(2).width = 40;

  sheet.getCell('A1').value = 'Property Schedule';
  sheet.getCell('A1').font = { bold: true, size: 14 };

  for (const { column, cell } of SCHEDULE_FIELD_MAPPING) {
    const label = sheet.getCell(cell.replace(/^[A-Z]+/, 'A'));
    label.value = column;
    label.font = { bold: true };
    sheet.getCell(cell).value = TEMPLATE_PLACEHOLDER;
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
}
