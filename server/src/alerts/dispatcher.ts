import { toErrorMessage } from '../errors';
import type { IncidentSignal } from '../incidents/engine';
import type { Logger } from '../logger';
import type { ResultStore } from '../store/types';
import type { ChannelKind, CheckOutcome, Incident, Target } from '../types';
import type { ChannelRegistry } from './channels';
import { buildAlertMessage } from './messages';
import { planAlerts, type EscalationPolicy } from './policy';

export type DispatchStatus = 'sent' | 'failed' | 'skipped';

export type DispatchResult = {
  channel: ChannelKind;
  status: DispatchStatus;
  error?: string;
};

export type DispatchContext = {
  target: Target;
  incident: Incident;
  outcome: CheckOutcome;
  policy: EscalationPolicy;
};

export class AlertDispatcher {
  private readonly store: ResultStore;
  private readonly channels: ChannelRegistry;
  private readonly logger: Logger;

  constructor(params: { store: ResultStore; channels: ChannelRegistry; logger: Logger }) {
    this.store = params.store;
    this.channels = params.channels;
    this.logger = params.logger;
  }

  /**
   * Sends the notifications due for `signal`. A channel's alerted flag is only
   * recorded after a successful send; failed channels stay unflagged and are
   * planned again on the next signal for the incident. A send whose flag cannot
   * be recorded is still reported as sent, with the store error attached.
   */
  async dispatch(signal: IncidentSignal, context: DispatchContext): Promise<DispatchResult[]> {
    const { target, incident, outcome, policy } = context;
    const planned = planAlerts(signal, incident, policy);
    if (!planned.length) {
      return [];
    }

    const message = buildAlertMessage(signal, { target, incident, outcome });
    const results: DispatchResult[] = [];

    for (const kind of planned) {
      const channel = this.channels.get(kind);
      if (!channel) {
        this.logger.warn(
          { target: target.name, incidentId: incident.id, channel: kind },
          'alert channel not configured'
        );
        results.push({ channel: kind, status: 'skipped' });
        continue;
      }

      try {
        await channel.send(message);
      } catch (err) {
        const error = toErrorMessage(err);
        this.logger.error(
          { target: target.name, incidentId: incident.id, channel: kind, err: error },
          'alert send failed'
        );
        results.push({ channel: kind, status: 'failed', error });
        continue;
      }

      this.logger.info(
        { target: target.name, incidentId: incident.id, channel: kind, kind: message.kind },
        'alert sent'
      );
      results.push(await this.flag(signal, incident, kind));
    }

    return results;
  }

  private async flag(
    signal: IncidentSignal,
    incident: Incident,
    kind: ChannelKind
  ): Promise<DispatchResult> {
    if (signal.kind === 'resolved') {
      return { channel: kind, status: 'sent' };
    }
    try {
      await this.store.setAlerted(incident.id, kind);
      return { channel: kind, status: 'sent' };
    } catch (err) {
      const error = toErrorMessage(err);
      this.logger.error(
        { target: incident.target, incidentId: incident.id, channel: kind, err: error },
        'alert flag not recorded'
      );
      return { channel: kind, status: 'sent', error };
    }
  }
}
