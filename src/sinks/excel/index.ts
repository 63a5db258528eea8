import path from 'node:path';
import ExcelJS from 'exceljs';
import { ensureDir } from '../../lib/fs.js';
import type { Table } from '../tables.js';

export interface WriteExcelInput {
  tables: Table[];
  outputPath: string;
}

/** Excel sheet names are capped at 31 characters. */
function sheetName(name: string): string {
  return name.length > 31 ? name.slice(0, 31) : name;
}

export async function writeExcelFile(input: WriteExcelInput): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  for (const table of input.tables) {
    const worksheet = workbook.addWorksheet(sheetName(table.name));
    worksheet.addRow(table.columns);

    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };

    for (const row of table.rows) {
      // Excel has no null cell; leave the cell blank
      worksheet.addRow(table.columns.map((column) => row[column] ?? ''));
    }

    worksheet.columns.forEach((column) => {
      column.width = Math.max(column.width ?? 10, 15);
    });
  }

  await ensureDir(path.dirname(input.outputPath));
  await workbook.xlsx.writeFile(input.outputPath);
}
