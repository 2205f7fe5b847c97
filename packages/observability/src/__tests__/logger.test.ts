import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { createServiceLogger, maskPII } from '../index';

describe('maskPII', () => {
  it('masks taxpayer identifiers and contact details', () => {
    expect(maskPII('VRN 123456789 for jane@example.com')).toBe('VRN [TAXREF] for [EMAIL]');
    expect(maskPII('NINO QQ123456C')).toBe('NINO [NINO]');
    expect(maskPII('card 4111 1111 1111 1111')).toBe('card [CARD]');
    expect(maskPII('period 24A1')).toBe('period 24A1');
  });
});

describe('createServiceLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('masks string metadata and carries the context', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createServiceLogger('filing-service', { component: 'test' });

    logger.info('Submitting for 123456789', { vrn: '123456789', attempt: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      service: 'filing-service',
      level: 'info',
      message: 'Submitting for [TAXREF]',
      metadata: { component: 'test', vrn: '[TAXREF]', attempt: 2 },
    });
  });
});
