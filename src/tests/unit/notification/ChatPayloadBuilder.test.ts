import {
  CHAT_USERNAME,
  ChatPayloadBuilder,
  buildStatusText,
  getColor,
  withChannel,
} from '../../../services/notification/ChatPayloadBuilder';
import { MissingRequiredFieldError } from '../../../types/MonitorErrors';
import { metricPoint, testIdentity } from '../../__mocks__/monitor-fixtures';

const footerIconUrl = 'https://example.com/icon.png';

describe('ChatPayloadBuilder', () => {
  let builder: ChatPayloadBuilder;

  beforeEach(() => {
    builder = new ChatPayloadBuilder({ identity: testIdentity, footerIconUrl });
  });

  describe('buildStatusText', () => {
    it('should describe breaches and recoveries', () => {
      expect(buildStatusText('SES account reputation', 'CRITICAL')).toEqual({
        fallback: 'SES account reputation has breached CRITICAL threshold.',
        primary: 'SES account reputation has breached the CRITICAL threshold.',
      });
      expect(buildStatusText('SES account sending rate', 'OK')).toEqual({
        fallback: 'SES account sending rate has recovered.',
        primary: 'SES account sending rate status is OK.',
      });
    });

    it('should map statuses to attachment colors', () => {
      expect(getColor('CRITICAL')).toBe('danger');
      expect(getColor('WARNING')).toBe('warning');
      expect(getColor('OK')).toBe('ok');
    });
  });

  describe('quota messages', () => {
    it('should list quota fields in display order', () => {
      const message = builder.buildQuotaTrigger({
        status: 'CRITICAL',
        utilizationPercent: 150,
        thresholdPercent: 90,
        volume: 15,
        maxVolume: 10,
        metricIsoTs: '2026-01-01T00:00:00.000Z',
        eventUnixTs: 1767225600,
      });

      expect(message).toEqual({
        attachments: [
          {
            fallback: 'SES account sending rate has breached CRITICAL threshold.',
            color: 'danger',
            fields: [
              { title: 'Service', value: `<${testIdentity.sesConsoleUrl}|SES Account Sending>`, short: true },
              { title: 'Account', value: 'acme', short: true },
              { title: 'Region', value: 'us-west-2', short: true },
              { title: 'Environment', value: 'test', short: true },
              { title: 'Status', value: 'CRITICAL', short: true },
              { title: 'Time', value: '2026-01-01T00:00:00.000Z' },
              { title: 'Utilization', value: '150.00%', short: true },
              { title: 'Threshold', value: '90.00%', short: true },
              { title: 'Volume', value: 15, short: true },
              { title: 'Max Volume', value: 10, short: true },
              { title: 'Message', value: 'SES account sending rate has breached the CRITICAL threshold.', short: false },
            ],
            footer: testIdentity.serviceName,
            footer_icon: footerIconUrl,
            ts: 1767225600,
          },
        ],
        username: CHAT_USERNAME,
      });
    });

    it('should build OK messages only through resolve', () => {
      const input = { utilizationPercent: 10, thresholdPercent: 80, volume: 1, maxVolume: 10 };

      expect(() => builder.buildQuotaTrigger({ ...input, status: 'OK' })).toThrow(MissingRequiredFieldError);
      expect(builder.buildQuotaResolve(input).attachments[0].color).toBe('ok');
    });
  });

  describe('reputation messages', () => {
    it('should add a value / threshold and a time field per metric', () => {
      const message = builder.buildReputationTrigger({
        status: 'WARNING',
        metrics: [metricPoint('Complaint Rate', 0.02, 0.01)],
        action: 'enable',
        eventUnixTs: 1767227400,
      });

      expect(message.attachments[0].fields).toEqual([
        {
          title: 'Service',
          value: `<${testIdentity.sesReputationDashboardUrl}|SES Account Reputation>`,
          short: true,
        },
        { title: 'Account', value: 'acme', short: true },
        { title: 'Region', value: 'us-west-2', short: true },
        { title: 'Environment', value: 'test', short: true },
        { title: 'Status', value: 'WARNING', short: true },
        { title: 'Action', value: 'ENABLE', short: true },
        { title: 'Complaint Rate / Threshold', value: '0.02% / 0.01%', short: true },
        { title: 'Complaint Rate Time', value: '2026-01-01T00:30:00.000Z', short: true },
        { title: 'Message', value: 'SES account reputation has breached the WARNING threshold.', short: false },
      ]);
      expect(message.attachments[0].color).toBe('warning');
    });

    it('should reject OK status and empty metrics on trigger', () => {
      expect(() => builder.buildReputationTrigger({ status: 'OK', metrics: [metricPoint('Bounce Rate', 1, 5)] })).toThrow(
        MissingRequiredFieldError
      );
      expect(() => builder.buildReputationTrigger({ status: 'CRITICAL', metrics: [] })).toThrow(
        MissingRequiredFieldError
      );
    });

    it('should build recovery messages with the OK metrics', () => {
      const message = builder.buildReputationResolve({
        metrics: [metricPoint('Bounce Rate', 1, 5)],
        action: 'enable',
      });

      expect(message.attachments[0].fallback).toBe('SES account reputation has recovered.');
      expect(message.attachments[0].fields.map((field) => field.title)).toContain('Bounce Rate / Threshold');
    });
  });

  it('should include the icon emoji only when configured', () => {
    const withEmoji = new ChatPayloadBuilder({ identity: testIdentity, footerIconUrl, iconEmoji: ':email:' });
    const input = { status: 'WARNING' as const, utilizationPercent: 85, thresholdPercent: 80, volume: 85, maxVolume: 100 };

    expect(withEmoji.buildQuotaTrigger(input).icon_emoji).toBe(':email:');
    expect('icon_emoji' in builder.buildQuotaTrigger(input)).toBe(false);
  });

  it('should address a copy of the message to a channel', () => {
    const message = builder.buildQuotaResolve({ utilizationPercent: 10, thresholdPercent: 80, volume: 1, maxVolume: 10 });
    const addressed = withChannel(message, '#ses-alerts');

    expect(addressed.channel).toBe('#ses-alerts');
    expect(addressed.attachments).toBe(message.attachments);
    expect('channel' in message).toBe(false);
  });
});
