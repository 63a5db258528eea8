import { describe, expect, it } from 'vitest';
import { APPLICATION_FLAG_NAMES } from '../canon/application.js';
import { validateApplications } from '../normalize/applications.js';
import { TEST_CLOCK, rawApplication } from './fixtures.js';

function validateOne(overrides: Parameters<typeof rawApplication>[0]) {
  const [application] = validateApplications([rawApplication(overrides)], TEST_CLOCK);
  if (!application) {
    throw new Error('expected one application');
  }
  return application;
}

describe('validateApplications', () => {
  it('types and normalizes a clean row', () => {
    const application = validateOne({});

    expect(application).toMatchObject({
      source_row: 1,
      application_id: 'APP001',
      customer_email: 'jane.doe@example.com',
      installation_type: 'solar_pv',
      system_size_kwp: 6.5,
      loan_amount_eur: 20000,
      loan_term_months: 120,
      application_date: '2024-01-15',
      credit_score: 720,
      annual_income_eur: 50000,
      postal_code: '10115',
      status: 'approved',
      risk_category: 'Good',
      loan_to_income_ratio: 0.4,
      processed_at: '2024-06-15T08:30:00Z'
    });
    for (const name of APPLICATION_FLAG_NAMES) {
      expect(application.data_quality_flags[name]).toBe(false);
    }
  });

  it('flags an out-of-range score and a short postal code', () => {
    const application = validateOne({ credit_score: '900', postal_code: '1234' });

    expect(application.data_quality_flags).toEqual({
      application_id_null: false,
      application_id_duplicate: false,
      loan_amount_non_positive: false,
      credit_score_missing: false,
      credit_score_out_of_range: true,
      postal_code_invalid: true,
      installation_type_invalid: false,
      system_size_invalid: false,
      system_size_present_for_heat_pump: false
    });
    expect(application.risk_category).toBe('Invalid');
  });

  it('flags every occurrence of a duplicated application_id', () => {
    const applications = validateApplications(
      [
        rawApplication({ application_id: 'APP010' }, 1),
        rawApplication({ application_id: 'APP011' }, 2),
        rawApplication({ application_id: 'APP010' }, 3)
      ],
      TEST_CLOCK
    );

    expect(applications.map((application) => application.data_quality_flags.application_id_duplicate)).toEqual([
      true,
      false,
      true
    ]);
  });

  it('flags missing and blank ids without treating them as duplicates', () => {
    const applications = validateApplications(
      [rawApplication({ application_id: null }, 1), rawApplication({ application_id: null }, 2)],
      TEST_CLOCK
    );

    expect(applications[0]?.data_quality_flags.application_id_null).toBe(true);
    expect(applications[0]?.data_quality_flags.application_id_duplicate).toBe(false);
    expect(validateOne({ application_id: '  ' }).data_quality_flags.application_id_null).toBe(true);
  });

  it('turns unparseable values into null and lets the flags report it', () => {
    const application = validateOne({ credit_score: 'n/a', loan_amount_eur: 'lots', application_date: 'soon' });

    expect(application.credit_score).toBeNull();
    expect(application.loan_amount_eur).toBeNull();
    expect(application.application_date).toBeNull();
    expect(application.data_quality_flags.credit_score_missing).toBe(true);
    expect(application.data_quality_flags.credit_score_out_of_range).toBe(false);
    expect(application.data_quality_flags.loan_amount_non_positive).toBe(true);
    expect(application.risk_category).toBe('Unknown');
    expect(application.loan_to_income_ratio).toBeNull();
  });

  it('reads float-formatted integer columns', () => {
    const application = validateOne({ credit_score: '720.0', loan_term_months: '1.2e2' });

    expect(application.credit_score).toBe(720);
    expect(application.loan_term_months).toBe(120);
    expect(application.risk_category).toBe('Good');
    expect(application.data_quality_flags.credit_score_missing).toBe(false);
  });

  it('checks system size against the installation type', () => {
    const heatPumpWithSize = validateOne({ installation_type: 'heat_pump', system_size_kwp: '3' });
    expect(heatPumpWithSize.data_quality_flags.system_size_present_for_heat_pump).toBe(true);
    expect(heatPumpWithSize.data_quality_flags.system_size_invalid).toBe(false);

    const heatPump = validateOne({ installation_type: 'heat_pump', system_size_kwp: null });
    expect(heatPump.data_quality_flags.system_size_present_for_heat_pump).toBe(false);
    expect(heatPump.data_quality_flags.system_size_invalid).toBe(false);

    const emptyBattery = validateOne({ installation_type: 'solar_battery', system_size_kwp: '0' });
    expect(emptyBattery.data_quality_flags.system_size_invalid).toBe(true);

    const unsizedSolar = validateOne({ system_size_kwp: null });
    expect(unsizedSolar.data_quality_flags.system_size_invalid).toBe(true);
  });

  it('flags unknown installation types without judging their size', () => {
    const application = validateOne({ installation_type: 'wind', system_size_kwp: null });

    expect(application.data_quality_flags.installation_type_invalid).toBe(true);
    expect(application.data_quality_flags.system_size_invalid).toBe(false);
    expect(validateOne({ installation_type: null }).data_quality_flags.installation_type_invalid).toBe(true);
  });

  it('leaves the loan-to-income ratio empty for non-positive amounts or income', () => {
    const negativeLoan = validateOne({ loan_amount_eur: '-100' });
    expect(negativeLoan.data_quality_flags.loan_amount_non_positive).toBe(true);
    expect(negativeLoan.loan_to_income_ratio).toBeNull();

    expect(validateOne({ annual_income_eur: '0' }).loan_to_income_ratio).toBeNull();
  });

  it('stamps every row with the same processing timestamp', () => {
    const applications = validateApplications(
      [rawApplication({ application_id: 'APP001' }, 1), rawApplication({ application_id: 'APP002' }, 2)],
      TEST_CLOCK
    );

    expect(new Set(applications.map((application) => application.processed_at))).toEqual(
      new Set(['2024-06-15T08:30:00Z'])
    );
  });
});
