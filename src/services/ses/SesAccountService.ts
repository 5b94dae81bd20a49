import {
  SESClient,
  GetSendQuotaCommand,
  GetSendQuotaCommandOutput,
  GetAccountSendingEnabledCommand,
  UpdateAccountSendingEnabledCommand,
} from '@aws-sdk/client-ses';
import type { IAccountControl, ISendingStatsSource } from '../../types/CollaboratorTypes';
import type { SendingStats } from '../../types/MonitorTypes';
import { getUtilizationPercent } from '../quota/QuotaEvaluator';
import { Logger } from '../core/Logger';

/**
 * SesAccountService - SES sending quota and the account-level sending switch
 */
export class SesAccountService implements ISendingStatsSource, IAccountControl {
  private sesClient: SESClient;
  private logger: Logger;

  constructor(logger: Logger, sesClient: SESClient) {
    this.logger = logger;
    this.sesClient = sesClient;
  }

  async getSendQuota(): Promise<GetSendQuotaCommandOutput> {
    this.logger.info('Requesting SES send quota', { method: 'getSendQuota' });
    const response = await this.sesClient.send(new GetSendQuotaCommand({}));
    this.logger.info('Received SES send quota', {
      method: 'getSendQuota',
      sentLast24Hours: response.SentLast24Hours,
      max24HourSend: response.Max24HourSend,
      maxSendRate: response.MaxSendRate,
    });
    return response;
  }

  async getSendingStats(): Promise<SendingStats> {
    const quota = await this.getSendQuota();
    return {
      volume: quota.SentLast24Hours ?? 0,
      max_volume: quota.Max24HourSend ?? 0,
    };
  }

  /**
   * Utilization of the 24 hour quota, 80% is 80.
   */
  async getSendingUtilizationPercent(): Promise<number> {
    const { volume, max_volume } = await this.getSendingStats();
    return getUtilizationPercent(volume, max_volume);
  }

  /**
   * Remaining share of the 24 hour quota, never below 0.
   */
  async getRemainingQuotaPercent(): Promise<number> {
    const remaining = 100 - (await this.getSendingUtilizationPercent());
    return remaining <= 0 ? 0 : remaining;
  }

  async isSendingRateOver(percent: number = 100): Promise<boolean> {
    const { volume, max_volume } = await this.getSendingStats();
    return volume >= (percent * max_volume) / 100;
  }

  async isSendingEnabled(): Promise<boolean> {
    const response = await this.sesClient.send(new GetAccountSendingEnabledCommand({}));
    return response.Enabled ?? false;
  }

  async enableSending(): Promise<void> {
    this.logger.info('Enabling SES account sending', { method: 'enableSending' });
    await this.sesClient.send(new UpdateAccountSendingEnabledCommand({ Enabled: true }));
    this.logger.info('SES account sending ENABLED', { method: 'enableSending' });
  }

  async disableSending(): Promise<void> {
    this.logger.info('Disabling SES account sending', { method: 'disableSending' });
    await this.sesClient.send(new UpdateAccountSendingEnabledCommand({ Enabled: false }));
    this.logger.info('SES account sending DISABLED', { method: 'disableSending' });
  }

  /**
   * Flips the sending switch and returns the new state.
   */
  async toggleSending(): Promise<boolean> {
    if (await this.isSendingEnabled()) {
      this.logger.debug('SES account sending is currently ENABLED, transitioning to DISABLED');
      await this.disableSending();
      return false;
    }
    this.logger.debug('SES account sending is currently DISABLED, transitioning to ENABLED');
    await this.enableSending();
    return true;
  }
}
