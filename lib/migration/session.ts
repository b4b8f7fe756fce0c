import type {
  Environment,
  EnvironmentRole,
  SubstitutionRule,
} from '../dataset-api/types';
import type { BulkAction, ItemState, PipelineMode } from './types';

export interface MigrationSessionInit {
  sourceBaseUrl: string;
  destinationBaseUrl: string;
  mode?: PipelineMode;
  rules?: readonly SubstitutionRule[];
}

/**
 * Migration session state
 *
 * Holds both environments' tokens, the operating mode, the substitution rules,
 * the listed identifiers with their bulk-action flags, and each item's state.
 * Passed explicitly to the pipeline; every change goes through a method here.
 */
export class MigrationSession {
  readonly source: Environment;
  readonly destination: Environment;
  mode: PipelineMode;
  rules: SubstitutionRule[];

  private identifiers: string[] = [];
  private readonly selections: Record<BulkAction, Map<string, boolean>> = {
    deploy: new Map(),
    delete: new Map(),
  };
  private readonly states = new Map<string, ItemState>();

  constructor(init: MigrationSessionInit) {
    this.source = { baseUrl: init.sourceBaseUrl };
    this.destination = { baseUrl: init.destinationBaseUrl };
    this.mode = init.mode ?? 'migration';
    this.rules = [...(init.rules ?? [])];
  }

  environment(role: EnvironmentRole): Environment {
    return role === 'source' ? this.source : this.destination;
  }

  /**
   * Record the outcome of authentication; undefined clears any previous token
   */
  setToken(role: EnvironmentRole, token: string | undefined): void {
    this.environment(role).authToken = token;
  }

  isAuthenticated(role: EnvironmentRole): boolean {
    return Boolean(this.environment(role).authToken);
  }

  listedIdentifiers(): string[] {
    return [...this.identifiers];
  }

  /**
   * Replace the listing; every bulk-action flag starts unset
   */
  setIdentifiers(identifiers: readonly string[]): void {
    this.identifiers = [...identifiers];
    for (const action of ['deploy', 'delete'] as const) {
      this.selections[action] = new Map(identifiers.map((identifier): [string, boolean] => [identifier, false]));
    }
  }

  select(action: BulkAction, identifier: string, flag = true): void {
    this.selections[action].set(identifier, flag);
  }

  isSelected(action: BulkAction, identifier: string): boolean {
    return this.selections[action].get(identifier) === true;
  }

  /**
   * Identifiers flagged for an action, in the order they were flagged or listed
   */
  selected(action: BulkAction): string[] {
    return [...this.selections[action].entries()]
      .filter(([, flag]) => flag)
      .map(([identifier]) => identifier);
  }

  markState(identifier: string, state: ItemState): void {
    this.states.set(identifier, state);
  }

  stateOf(identifier: string): ItemState {
    return this.states.get(identifier) ?? 'pending';
  }

  /**
   * Forget item states, e.g. after the staging workspace was cleared
   */
  resetStates(): void {
    this.states.clear();
  }
}
