import { asPersistenceError } from '../errors';
import type { Logger } from '../logger';
import type { ResultStore } from '../store/types';
import type { CheckOutcome, Incident } from '../types';

export type IncidentAction = 'open' | 'update' | 'resolve' | 'none';

export type IncidentSignal =
  | { kind: 'new' }
  | { kind: 'updated'; failureCount: number }
  | { kind: 'resolved' };

export type Transition = {
  outcome: CheckOutcome;
  action: IncidentAction | 'replay';
  incident: Incident | null;
  signal: IncidentSignal | null;
};

/**
 * Pure transition rule. `open` is the target's unresolved incident (open or
 * acknowledged), if any.
 *
 *   failure, no incident   -> open
 *   failure, incident      -> update (streak + 1)
 *   success, incident      -> resolve
 *   success, no incident   -> none
 */
export function decideAction(open: Incident | null, outcome: CheckOutcome): IncidentAction {
  if (outcome.status === 'success') {
    return open ? 'resolve' : 'none';
  }
  return open ? 'update' : 'open';
}

export function signalFor(action: IncidentAction, incident: Incident | null): IncidentSignal | null {
  switch (action) {
    case 'open':
      return { kind: 'new' };
    case 'update':
      return { kind: 'updated', failureCount: incident?.failureCount ?? 0 };
    case 'resolve':
      return { kind: 'resolved' };
    case 'none':
      return null;
  }
}

type Persisted = { replayed: true } | { replayed: false; incident: Incident | null };

export class IncidentEngine {
  constructor(
    private readonly store: ResultStore,
    private readonly logger: Logger
  ) {}

  /**
   * Applies one persisted outcome to the target's incident state. Outcomes at or
   * below the target's applied cursor were already consumed and are ignored; the
   * store re-checks the cursor under its per-target lock, so a writer racing on
   * the same outcome sees a replay too.
   * Store failures surface as PersistenceError and leave the cursor untouched,
   * so the outcome is picked up again on the next cycle.
   */
  async apply(outcome: CheckOutcome): Promise<Transition> {
    try {
      const cursor = await this.store.appliedCursor(outcome.target);
      if (cursor !== null && outcome.id <= cursor) {
        return this.replay(outcome);
      }

      const open = await this.store.openIncident(outcome.target);
      const action = decideAction(open, outcome);
      const persisted = await this.persist(action, open, outcome);
      if (persisted.replayed) {
        return this.replay(outcome);
      }
      const { incident } = persisted;

      if (incident) {
        this.logger.info(
          {
            target: outcome.target,
            incidentId: incident.id,
            failureCount: incident.failureCount,
            action
          },
          `incident ${action}`
        );
      }

      return { outcome, action, incident, signal: signalFor(action, incident) };
    } catch (err) {
      throw asPersistenceError(err, `apply check ${outcome.id} for ${outcome.target}`);
    }
  }

  private replay(outcome: CheckOutcome): Transition {
    this.logger.debug({ target: outcome.target, checkId: outcome.id }, 'outcome replay ignored');
    return { outcome, action: 'replay', incident: null, signal: null };
  }

  private async persist(
    action: IncidentAction,
    open: Incident | null,
    outcome: CheckOutcome
  ): Promise<Persisted> {
    let incident: Incident | null;
    if (action === 'open') {
      incident = await this.store.createIncident(outcome);
    } else if (open && action === 'update') {
      incident = await this.store.updateIncident(open.id, outcome);
    } else if (open && action === 'resolve') {
      incident = await this.store.resolveIncident(open.id, outcome);
    } else {
      const advanced = await this.store.markApplied(outcome);
      return advanced ? { replayed: false, incident: null } : { replayed: true };
    }
    return incident ? { replayed: false, incident } : { replayed: true };
  }
}
