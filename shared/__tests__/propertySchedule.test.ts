import { describe, expect, it } from 'vitest';

import { getPropertyAddress, isActivated, SCHEDULE_FIELD_MAPPING, toFolderName } from '../propertySchedule';

describe('isActivated', () => {
  it('only treats a boolean true checkbox as active', () => {
    expect(isActivated({ 'Check Box': true })).toBe(true);
    expect(isActivated({ 'Check Box': false })).toBe(false);
    expect(isActivated({ 'Check Box': 'true' })).toBe(false);
    expect(isActivated({ 'Property Address': '12 Elm St' })).toBe(false);
  });
});

describe('getPropertyAddress', () => {
  it('trims the address and treats blanks as missing', () => {
    expect(getPropertyAddress({ 'Property Address': '  12 Elm St ' })).toBe('12 Elm St');
    expect(getPropertyAddress({ 'Property Address': '   ' })).toBeNull();
    expect(getPropertyAddress({})).toBeNull();
  });

  it('accepts numeric addresses and rejects booleans', () => {
    expect(getPropertyAddress({ 'Property Address': 221 })).toBe('221');
    expect(getPropertyAddress({ 'Property Address': true })).toBeNull();
  });
});

describe('toFolderName', () => {
  it('keeps ordinary addresses unchanged', () => {
    expect(toFolderName('12 Elm St')).toBe('12 Elm St');
  });

  it('replaces path separators and control characters', () => {
    expect(toFolderName('Flat 2/14 High St')).toBe('Flat 2-14 High St');
    expect(toFolderName('Unit 3\\4 Mill Lane')).toBe('Unit 3-4 Mill Lane');
    expect(toFolderName('Rose\tCottage')).toBe('Rose-Cottage');
  });

  it('never yields a relative directory name', () => {
    expect(toFolderName('..')).toBe('__');
    expect(toFolderName(' . ')).toBe('_');
  });
});

describe('SCHEDULE_FIELD_MAPPING', () => {
  it('places each sheet column in its schedule cell', () => {
    expect(SCHEDULE_FIELD_MAPPING.map(({ column, cell }) => `${column}=${cell}`)).toEqual([
      'Property Address=B3',
      'Local authority=B5',
      'EPC Score ( Rd SAP)=B6',
      'Tenure=B7',
    ]);
  });
});
