import {
  CUSTOM_DETAILS_VERSION,
  PagingPayloadBuilder,
} from '../../../services/notification/PagingPayloadBuilder';
import { MissingRequiredFieldError, PayloadTooLargeError } from '../../../types/MonitorErrors';
import { metricPoint, testIdentity, testRoutingKey } from '../../__mocks__/monitor-fixtures';

describe('PagingPayloadBuilder', () => {
  let builder: PagingPayloadBuilder;

  beforeEach(() => {
    builder = new PagingPayloadBuilder({ identity: testIdentity, routingKey: testRoutingKey });
  });

  it('should stamp custom details with the fixed wire version', () => {
    expect(CUSTOM_DETAILS_VERSION).toBe('v1.2018.06.18');
  });

  it('should derive dedup keys from the service name and event class', () => {
    expect(builder.getDedupKey('ses_account_sending_quota')).toBe(
      'acme-us-west-2-test-ses-account-monitor/ses_account_sending_quota'
    );
  });

  describe('buildQuotaTrigger', () => {
    it('should build a critical trigger with quota details', () => {
      const event = builder.buildQuotaTrigger({
        volume: 15,
        maxVolume: 10,
        utilizationPercent: 150,
        thresholdPercent: 90,
        eventIsoTs: '2026-01-01T00:00:00.000Z',
        metricTs: '2026-01-01T00:00:00.000Z',
      });

      expect(event).toEqual({
        routing_key: 'test-routing-key',
        dedup_key: 'acme-us-west-2-test-ses-account-monitor/ses_account_sending_quota',
        event_action: 'trigger',
        payload: {
          summary: 'SES account sending quota is at capacity.',
          timestamp: '2026-01-01T00:00:00.000Z',
          source: 'acme-us-west-2-test-ses-account-monitor',
          severity: 'critical',
          component: 'ses',
          group: 'aws-acme',
          class: 'ses_account_sending_quota',
          custom_details: {
            aws_account_name: 'acme',
            aws_region: 'us-west-2',
            aws_environment: 'test',
            volume: 15,
            max_volume: 10,
            utilization: '150%',
            threshold: '90%',
            ts: '2026-01-01T00:00:00.000Z',
            version: 'v1.2018.06.18',
          },
        },
        client: 'AWS Console',
        client_url: testIdentity.sesConsoleUrl,
      });
    });

    it('should reject a missing numeric field', () => {
      expect(() =>
        builder.buildQuotaTrigger({ volume: Number.NaN, maxVolume: 10, utilizationPercent: 0, thresholdPercent: 90 })
      ).toThrow(MissingRequiredFieldError);
    });
  });

  describe('buildReputationTrigger', () => {
    it('should add value, threshold and timestamp details per metric', () => {
      const event = builder.buildReputationTrigger({
        metrics: [metricPoint('Bounce Rate', 9, 8), metricPoint('Complaint Rate', 0.02, 0.01)],
        action: 'disable',
        eventIsoTs: '2026-01-01T00:30:00.000Z',
        eventUnixTs: 1767227400,
      });

      expect(event.dedup_key).toBe('acme-us-west-2-test-ses-account-monitor/ses_account_reputation');
      expect(event.payload.summary).toBe('SES account reputation is at dangerous levels.');
      expect(event.payload.class).toBe('ses_account_reputation');
      expect(event.payload.custom_details).toEqual({
        aws_account_name: 'acme',
        aws_region: 'us-west-2',
        aws_environment: 'test',
        ts: '1767227400',
        version: CUSTOM_DETAILS_VERSION,
        action: 'disable',
        action_message: 'SES account sending is disabled.',
        bounce_rate: '9.00%',
        bounce_rate_threshold: '8.00%',
        bounce_rate_timestamp: '2026-01-01T00:30:00.000Z',
        complaint_rate: '0.02%',
        complaint_rate_threshold: '0.01%',
        complaint_rate_timestamp: '2026-01-01T00:30:00.000Z',
      });
    });

    it('should default the action to alert', () => {
      const event = builder.buildReputationTrigger({ metrics: [metricPoint('Bounce Rate', 9, 8)] });

      expect(event.payload.custom_details.action).toBe('alert');
      expect(event.payload.custom_details.action_message).toBe('SES account is in danger of being suspended.');
    });

    it('should reject an empty metric list', () => {
      expect(() => builder.buildReputationTrigger({ metrics: [] })).toThrow(MissingRequiredFieldError);
    });

    it('should reject payloads above 512 KiB', () => {
      const label = 'x'.repeat(600 * 1024);

      expect(() => builder.buildReputationTrigger({ metrics: [metricPoint(label, 9, 8)] })).toThrow(
        PayloadTooLargeError
      );
    });
  });

  describe('resolve events', () => {
    it('should carry only routing key, dedup key and action', () => {
      expect(builder.buildQuotaResolve()).toEqual({
        routing_key: 'test-routing-key',
        dedup_key: 'acme-us-west-2-test-ses-account-monitor/ses_account_sending_quota',
        event_action: 'resolve',
      });
      expect(builder.buildReputationResolve().dedup_key).toBe(
        'acme-us-west-2-test-ses-account-monitor/ses_account_reputation'
      );
    });
  });

  describe('event for status', () => {
    const quotaInput = { volume: 9, maxVolume: 10, utilizationPercent: 90, thresholdPercent: 90 };

    it('should trigger on CRITICAL and resolve otherwise', () => {
      expect(builder.buildQuotaEventForStatus('CRITICAL', quotaInput).event_action).toBe('trigger');
      expect(builder.buildQuotaEventForStatus('WARNING', quotaInput).event_action).toBe('resolve');
      expect(builder.buildQuotaEventForStatus('OK', quotaInput).event_action).toBe('resolve');
      expect(builder.buildReputationEventForStatus('OK', { metrics: [] }).event_action).toBe('resolve');
    });
  });

  it('should require a routing key', () => {
    const unrouted = new PagingPayloadBuilder({ identity: testIdentity, routingKey: '' });

    expect(() => unrouted.buildQuotaResolve()).toThrow('Missing required field: routing_key');
  });
});
