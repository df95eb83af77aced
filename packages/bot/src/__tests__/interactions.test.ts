import { describe, it, expect } from 'vitest';
import { isMinorReportButton, modalCustomId, parseModalCustomId } from '../interactions/minor-report.js';
import { hasAnyRole } from '../commands/permissions.js';

describe('report modal ids', () => {
  it('carries the card message id', () => {
    expect(modalCustomId('approve', '900000000000000001')).toBe('minor_report_approve_modal:900000000000000001');
    expect(parseModalCustomId('minor_report_deny_modal:900000000000000001'))
      .toEqual({ action: 'deny', messageId: '900000000000000001' });
  });

  it.each([
    'minor_report_approve_modal:',
    'minor_report_approve_modal:abc',
    'minor_report_recheck_modal:1',
    'other_modal:1',
  ])('ignores %j', (customId) => {
    expect(parseModalCustomId(customId)).toBeNull();
  });
});

describe('isMinorReportButton', () => {
  it('matches the three persistent buttons only', () => {
    expect(isMinorReportButton('minor_report_approve')).toBe(true);
    expect(isMinorReportButton('minor_report_deny')).toBe(true);
    expect(isMinorReportButton('minor_report_recheck')).toBe(true);
    expect(isMinorReportButton('minor_report_approve_modal:1')).toBe(false);
  });
});

describe('hasAnyRole', () => {
  it('needs one of the allowed roles', () => {
    const roles = new Set(['111111111111111111']);

    expect(hasAnyRole(roles, ['222222222222222222', '111111111111111111'])).toBe(true);
    expect(hasAnyRole(roles, ['222222222222222222'])).toBe(false);
    expect(hasAnyRole(roles, [])).toBe(false);
  });
});
