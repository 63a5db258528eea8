import { describe, expect, it } from 'vitest';
import { formatNumber, renderCsv } from '../sinks/csvSink.js';
import {
  CLEANED_APPLICATION_COLUMNS,
  PORTFOLIO_COLUMNS,
  QUALITY_REPORT_COLUMNS,
  cleanedApplicationRow
} from '../sinks/tables.js';
import { validateApplications } from '../normalize/applications.js';
import { TEST_CLOCK, rawApplication } from './fixtures.js';

describe('renderCsv', () => {
  it('quotes every value and leaves nulls empty', () => {
    const csv = renderCsv({
      name: 'sample',
      columns: ['a', 'b', 'c', 'd'],
      rows: [
        { a: 'x', b: 1.5, c: true, d: null },
        { a: 'he said "hi", twice', b: 0, c: false, d: 'y' }
      ]
    });

    expect(csv).toBe('"a","b","c","d"\n"x","1.5","true",\n"he said ""hi"", twice","0","false","y"\n');
  });

  it('writes very small and very large numbers without exponent notation', () => {
    expect(formatNumber(1e-7)).toBe('0.0000001');
    expect(formatNumber(-2.5e-8)).toBe('-0.000000025');
    expect(formatNumber(1e21)).toBe('1000000000000000000000');
    expect(formatNumber(0.4)).toBe('0.4');

    const csv = renderCsv({ name: 'sample', columns: ['ratio'], rows: [{ ratio: 1e-7 }] });
    expect(csv).toBe('"ratio"\n"0.0000001"\n');
  });

  it('writes only the declared columns in declared order', () => {
    const csv = renderCsv({
      name: 'sample',
      columns: ['b', 'a'],
      rows: [{ a: 'first', b: 'second', ignored: 'z' }]
    });

    expect(csv).toBe('"b","a"\n"second","first"\n');
  });
});

describe('output tables', () => {
  it('flattens application flags into flag columns and a JSON mapping', () => {
    const [application] = validateApplications([rawApplication({ postal_code: '1234' })], TEST_CLOCK);
    if (!application) {
      throw new Error('expected one application');
    }

    const row = cleanedApplicationRow(application);

    expect(Object.keys(row)).toEqual(CLEANED_APPLICATION_COLUMNS);
    expect(row.flag_postal_code_invalid).toBe(true);
    expect(row.flag_credit_score_missing).toBe(false);
    expect(row.data_quality_flags).toBe(
      '{"application_id_null":false,"application_id_duplicate":false,"loan_amount_non_positive":false,"credit_score_missing":false,"credit_score_out_of_range":false,"postal_code_invalid":true,"installation_type_invalid":false,"system_size_invalid":false,"system_size_present_for_heat_pump":false}'
    );
  });

  it('declares nineteen rule counters on the report', () => {
    const counters = QUALITY_REPORT_COLUMNS.filter(
      (column) => column.startsWith('app_') || (column.startsWith('lms_') && column !== 'lms_processed')
    );

    expect(counters).toHaveLength(19);
    expect(QUALITY_REPORT_COLUMNS.slice(-2)).toEqual(['problematic_application_ids', 'processed_at']);
  });

  it('renames the loan side application id in the portfolio', () => {
    expect(PORTFOLIO_COLUMNS.filter((column) => column === 'application_id')).toHaveLength(1);
    expect(PORTFOLIO_COLUMNS).toContain('lms_application_id');
    expect(PORTFOLIO_COLUMNS.slice(-2)).toEqual(['delinquency_bucket', 'months_since_disbursement']);
  });
});
