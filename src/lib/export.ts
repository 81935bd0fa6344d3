import { createObjectCsvWriter } from "csv-writer";
import { Workbook } from "exceljs";
import type { ProductTable } from "./table";

export const EXCEL_SHEET_NAME = "Products";

export async function writeCsv(table: ProductTable, path: string): Promise<void> {
  const writer = createObjectCsvWriter({
    path,
    header: table.outputColumns().map((column) => ({ id: column, title: column })),
  });
  await writer.writeRecords(table.toRecords());
  console.log(`[export] wrote ${table.length} rows to ${path}`);
}

export async function writeExcel(table: ProductTable, path: string): Promise<void> {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(EXCEL_SHEET_NAME);
  sheet.columns = table.outputColumns().map((column) => ({ header: column, key: column }));
  for (const record of table.toRecords()) {
    sheet.addRow(record);
  }
  await workbook.xlsx.writeFile(path);
  console.log(`[export] wrote ${table.length} rows to ${path}`);
}
