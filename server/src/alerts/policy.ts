import type { IncidentSignal } from '../incidents/engine';
import type { AlertsConfig } from '../targets';
import type { ChannelKind, Incident, Target } from '../types';

export type EscalationStep = {
  channel: ChannelKind;
  escalateAfter: number;
};

export type EscalationPolicy = {
  firstAlert: ChannelKind;
  steps: EscalationStep[];
};

function defaultThreshold(alerts: AlertsConfig, channel: ChannelKind): number {
  switch (channel) {
    case 'chat':
      return alerts.chat.escalateAfter;
    case 'email':
      return alerts.email.escalateAfter;
    case 'sms':
      return alerts.sms.escalateAfter;
  }
}

export function resolvePolicy(target: Target, alerts: AlertsConfig): EscalationPolicy {
  const steps = target.alertChannels.map((channel) => ({
    channel,
    escalateAfter:
      channel === alerts.firstAlertChannel
        ? 1
        : (target.escalateAfter[channel] ?? defaultThreshold(alerts, channel))
  }));
  return { firstAlert: alerts.firstAlertChannel, steps };
}

/**
 * Channels that should be notified for `signal`, in the target's configured order.
 * Open/update signals fire every step whose threshold is reached and whose
 * alerted flag is still unset; recovery goes to the first-alert channel only.
 */
export function planAlerts(
  signal: IncidentSignal,
  incident: Incident,
  policy: EscalationPolicy
): ChannelKind[] {
  if (signal.kind === 'resolved') {
    return policy.steps.some((step) => step.channel === policy.firstAlert)
      ? [policy.firstAlert]
      : [];
  }

  const failureCount = signal.kind === 'new' ? 1 : signal.failureCount;
  return policy.steps
    .filter((step) => step.escalateAfter <= failureCount && !incident.alerted[step.channel])
    .map((step) => step.channel);
}
