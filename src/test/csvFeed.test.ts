import { describe, expect, it } from 'vitest';
import { FEED_LAYOUTS } from '../config/feeds.js';
import { decodeFeed } from '../ingress/csvFeed.js';
import { FeedFormatError, PipelineError } from '../lib/errors.js';
import { APPLICATIONS_HEADER, csvText } from './fixtures.js';

describe('decodeFeed', () => {
  const text = csvText(APPLICATIONS_HEADER, [
    'APP001,a@b.de,INST01,solar_pv,6.5,20000,120,2024-01-15,720,50000,10115,approved',
    'APP002,"x@y.de",INST02,heat_pump,,15000,60,2024-01-20,680,42000,"",pending',
    'APP003,c@d.de,INST01',
    'APP004,comma,e@f.de,INST03,solar_pv,5,10000,60,2024-02-01,700,30000,80331,approved'
  ]);

  it('keeps every cell as text keyed by header column', () => {
    const records = decodeFeed(text, FEED_LAYOUTS.applications);

    expect(records).toHaveLength(4);
    expect(records[0]?.feed).toBe('applications');
    expect(records[0]?.row).toBe(1);
    expect(records[0]?.values.credit_score).toBe('720');
    expect(records[0]?.values.status).toBe('approved');
    expect(records[0]?.overflow).toEqual([]);
  });

  it('turns unquoted empty cells into null and keeps quoted empty cells', () => {
    const records = decodeFeed(text, FEED_LAYOUTS.applications);

    expect(records[1]?.values.customer_email).toBe('x@y.de');
    expect(records[1]?.values.system_size_kwp).toBeNull();
    expect(records[1]?.values.postal_code).toBe('');
  });

  it('pads short rows with null', () => {
    const records = decodeFeed(text, FEED_LAYOUTS.applications);

    expect(records[2]?.values.installer_partner_id).toBe('INST01');
    expect(records[2]?.values.installation_type).toBeNull();
    expect(records[2]?.values.status).toBeNull();
    expect(records[2]?.overflow).toEqual([]);
  });

  it('moves cells past the header into overflow without realigning the row', () => {
    const records = decodeFeed(text, FEED_LAYOUTS.applications);

    expect(records[3]?.values.customer_email).toBe('comma');
    expect(records[3]?.values.installer_partner_id).toBe('e@f.de');
    expect(records[3]?.values.status).toBe('80331');
    expect(records[3]?.overflow).toEqual(['approved']);
  });

  it('rejects a header without the expected columns', () => {
    const lms = 'loan_id,application_id\nLN1,APP1\n';

    expect(() => decodeFeed(lms, FEED_LAYOUTS.lms)).toThrow(FeedFormatError);
    expect(() => decodeFeed(lms, FEED_LAYOUTS.lms)).toThrow(
      '[ingest] lms feed header is missing expected columns: disbursement_date, current_balance_eur, days_past_due, payment_status, last_payment_date, next_payment_due'
    );
  });

  it('rejects an empty feed', () => {
    expect(() => decodeFeed('', FEED_LAYOUTS.applications)).toThrow(FeedFormatError);
  });

  it('keeps a stray quote inside an unquoted cell as text', () => {
    const records = decodeFeed(
      csvText(APPLICATIONS_HEADER, ['APP1,ja"ne@x.de,I1,solar_pv,6.5,20000,120,2024-01-15,720,50000,10115,approved']),
      FEED_LAYOUTS.applications
    );

    expect(records).toHaveLength(1);
    expect(records[0]?.values.customer_email).toBe('ja"ne@x.de');
    expect(records[0]?.values.installer_partner_id).toBe('I1');
    expect(records[0]?.overflow).toEqual([]);
  });

  it('reports an unterminated quoted cell as an ingest error', () => {
    const text = csvText(APPLICATIONS_HEADER, ['APP1,"jane@x.de,I1']);

    expect(() => decodeFeed(text, FEED_LAYOUTS.applications)).toThrow(PipelineError);
    expect(() => decodeFeed(text, FEED_LAYOUTS.applications)).toThrow(/^\[ingest\] applications feed could not be decoded: /);
  });
});
