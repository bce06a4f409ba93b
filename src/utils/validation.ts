// src/utils/validation.ts
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export class Validators {
  /**
   * Whole number, optionally signed: "3", "-2", "+10"
   */
  static isIntegerText(text: string): boolean {
    return /^[+-]?\d+$/.test(text.trim());
  }

  /**
   * Parse a sheet date. Sheets are written M/D/YYYY; ISO dates are accepted as well.
   * Returns null when the text is not a real calendar date.
   */
  static parseSheetDate(text: string): CalendarDate | null {
    const trimmed = text.trim();
    const us = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    const iso = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})$/);

    let year: number;
    let month: number;
    let day: number;

    if (us) {
      month = Number(us[1]);
      day = Number(us[2]);
      year = Number(us[3]);
    } else if (iso) {
      year = Number(iso[1]);
      month = Number(iso[2]);
      day = Number(iso[3]);
    } else {
      return null;
    }

    const d = new Date(year, month - 1, day);
    if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
      return null;
    }
    return { year, month, day };
  }

  static isValidSheetDate(text: string): boolean {
    return Validators.parseSheetDate(text) !== null;
  }

  /**
   * Parse a yes/no style answer. Returns null when the text is not recognised.
   */
  static parseBoolean(text: string): boolean | null {
    const normalized = text.trim().toLowerCase();
    if (['true', 'yes', 'y', '1'].includes(normalized)) return true;
    if (['false', 'no', 'n', '0'].includes(normalized)) return false;
    return null;
  }
}
