import {
  CloudWatchClient,
  GetMetricDataCommand,
  GetMetricDataCommandInput,
  MetricDataQuery,
  MetricDataResult,
} from '@aws-sdk/client-cloudwatch';
import type { IReputationMetricsSource } from '../../types/CollaboratorTypes';
import type { ReputationMetricId, ReputationSeries } from '../../types/MonitorTypes';
import { REPUTATION_METRIC_IDS } from '../../types/MonitorTypes';
import { Logger } from '../core/Logger';

const REPUTATION_METRICS: Record<ReputationMetricId, { metricName: string; label: string }> = {
  bounce_rate: { metricName: 'Reputation.BounceRate', label: 'Bounce Rate' },
  complaint_rate: { metricName: 'Reputation.ComplaintRate', label: 'Complaint Rate' },
};

function isReputationMetricId(id: string | undefined): id is ReputationMetricId {
  return REPUTATION_METRIC_IDS.some((known) => known === id);
}

/**
 * CloudWatchReputationService - SES reputation metrics from CloudWatch
 *
 * CloudWatch reports reputation as a fraction (0.05); series are returned on the
 * 0-100 scale (5).
 */
export class CloudWatchReputationService implements IReputationMetricsSource {
  private cloudWatchClient: CloudWatchClient;
  private logger: Logger;

  constructor(logger: Logger, cloudWatchClient: CloudWatchClient) {
    this.logger = logger;
    this.cloudWatchClient = cloudWatchClient;
  }

  buildMetricDataQueries(periodSeconds: number): MetricDataQuery[] {
    return REPUTATION_METRIC_IDS.map((id) => ({
      Id: id,
      MetricStat: {
        Metric: {
          Namespace: 'AWS/SES',
          MetricName: REPUTATION_METRICS[id].metricName,
        },
        Period: periodSeconds,
        Stat: 'Average',
      },
      Label: REPUTATION_METRICS[id].label,
      ReturnData: true,
    }));
  }

  async getReputationMetrics(
    windowStart: Date,
    windowEnd: Date,
    periodSeconds: number
  ): Promise<ReputationSeries[]> {
    const input: GetMetricDataCommandInput = {
      MetricDataQueries: this.buildMetricDataQueries(periodSeconds),
      StartTime: windowStart,
      EndTime: windowEnd,
    };

    this.logger.info('Requesting SES reputation metric data', {
      method: 'getReputationMetrics',
      startTime: windowStart.toISOString(),
      endTime: windowEnd.toISOString(),
      period: periodSeconds,
    });

    const results: MetricDataResult[] = [];
    let nextToken: string | undefined;
    do {
      const response = await this.cloudWatchClient.send(
        new GetMetricDataCommand({ ...input, ...(nextToken ? { NextToken: nextToken } : {}) })
      );
      results.push(...(response.MetricDataResults ?? []));
      nextToken = response.NextToken;
    } while (nextToken);

    this.logger.info('Received SES reputation metric data', {
      method: 'getReputationMetrics',
      results: results.map((r) => ({ id: r.Id, count: r.Values?.length ?? 0, status: r.StatusCode })),
    });

    return this.toSeries(results);
  }

  /**
   * Merges paginated results per metric id and converts fractions to percentages.
   */
  toSeries(results: MetricDataResult[]): ReputationSeries[] {
    const byId = new Map<ReputationMetricId, ReputationSeries>();

    for (const result of results) {
      if (!isReputationMetricId(result.Id)) {
        this.logger.warn('Ignoring unexpected metric data result', { id: result.Id });
        continue;
      }

      const series = byId.get(result.Id) ?? {
        id: result.Id,
        label: result.Label || REPUTATION_METRICS[result.Id].label,
        timestamps: [],
        values: [],
      };

      const timestamps = result.Timestamps ?? [];
      const values = result.Values ?? [];
      const count = Math.min(timestamps.length, values.length);
      for (let i = 0; i < count; i++) {
        series.timestamps.push(timestamps[i]);
        series.values.push(values[i] * 100);
      }

      byId.set(result.Id, series);
    }

    return REPUTATION_METRIC_IDS.flatMap((id) => {
      const series = byId.get(id);
      return series ? [series] : [];
    });
  }
}
