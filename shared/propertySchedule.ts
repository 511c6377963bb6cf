export type PropertyCellValue = string | number | boolean;

/** Sparse row: a column that is absent had no value in the sheet. */
export type PropertyRow = Record<string, PropertyCellValue>;

export const ADDRESS_COLUMN = 'Property Address';

export const ACTIVATION_COLUMN = 'Check Box';

export const SCHEDULE_FIELD_MAPPING = [
  { column: ADDRESS_COLUMN, cell: 'B3' },
  { column: 'Local authority', cell: 'B5' },
  { column: 'EPC Score ( Rd SAP)', cell: 'B6' },
  { column: 'Tenure', cell: 'B7' },
] as const;

export const isActivated = (row: PropertyRow): boolean => row[ACTIVATION_COLUMN] === true;

export const getPropertyAddress = (row: PropertyRow): string | null => {
  const value = row[ADDRESS_COLUMN];
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const address = String(value).trim();
  return address.length > 0 ? address : null;
};

/**
 * Directory and file stem used for an address. Path separators and control
 * characters are replaced so the address stays a single path segment.
 */
export const toFolderName = (address: string): string => {
  const cleaned = address.trim().replace(/[\\/\u0000-\u001f]/g, '-');
  if (cleaned === '.' || cleaned === '..') {
    return cleaned.replace(/\./g, '_');
  }
  return cleaned;
};
