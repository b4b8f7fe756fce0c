/**
 * Dataset migration pipeline
 * authenticate → list → fetch → stage ⇄ edit → transform → upsert, plus delete
 */

import { authenticate } from '../dataset-api/auth/token-provider';
import type { EnvironmentCredentials } from '../dataset-api/config';
import { DEFAULT_ENDPOINTS, type EndpointCatalog } from '../dataset-api/endpoints';
import { AuthenticationError, errorMessage } from '../dataset-api/errors';
import { DatasetHttpClient } from '../dataset-api/http/client';
import { logger } from '../dataset-api/logging';
import {
  deleteDataset,
  fetchDataset,
  listDatasetIdentifiers,
  upsertDataset,
} from '../dataset-api/resources/datasets';
import type {
  DatasetPayload,
  DeleteResult,
  EnvironmentRole,
  UpsertResult,
} from '../dataset-api/types';
import { decodePayload, encodePayload, payloadFromWire, payloadToWire } from './codec';
import { NotStagedError } from './errors';
import { MigrationSession } from './session';
import { StagingStore } from './staging-store';
import { substitutePayload } from './substitution';
import type {
  BatchAction,
  BatchResult,
  ItemOutcome,
  TransformOptions,
} from './types';

export interface PipelineDependencies {
  client: DatasetHttpClient;
  store: StagingStore;
  endpoints?: EndpointCatalog;
  timeouts?: {
    authMs?: number;
    requestMs?: number;
  };
}

export type AuthOutcome = { ok: true } | { ok: false; error: string };

/**
 * Sequences the dataset operations for one session
 *
 * Every item is handled on its own: a failure is recorded against that item
 * and the batch carries on. Nothing is rolled back.
 */
export class DatasetMigrationPipeline {
  private readonly endpoints: EndpointCatalog;

  constructor(
    private readonly session: MigrationSession,
    private readonly deps: PipelineDependencies
  ) {
    this.endpoints = deps.endpoints ?? DEFAULT_ENDPOINTS;
  }

  private get requestOptions() {
    return { endpoints: this.endpoints, timeoutMs: this.deps.timeouts?.requestMs };
  }

  private requireToken(role: EnvironmentRole): string {
    const token = this.session.environment(role).authToken;
    if (!token) {
      throw new AuthenticationError(`The ${role} environment is not authenticated.`);
    }
    return token;
  }

  /**
   * Authenticate one environment; on failure its token is cleared
   */
  async authenticate(role: EnvironmentRole, credentials: EnvironmentCredentials): Promise<string> {
    const environment = this.session.environment(role);
    try {
      const token = await authenticate(this.deps.client, environment.baseUrl, credentials, {
        candidates: this.endpoints.auth,
        timeoutMs: this.deps.timeouts?.authMs,
      });
      this.session.setToken(role, token);
      return token;
    } catch (error) {
      this.session.setToken(role, undefined);
      throw error;
    }
  }

  /**
   * Authenticate source then destination; one side failing does not stop the other
   */
  async authenticateBoth(
    credentials: Record<EnvironmentRole, EnvironmentCredentials>
  ): Promise<Record<EnvironmentRole, AuthOutcome>> {
    const outcomes: Record<EnvironmentRole, AuthOutcome> = {
      source: { ok: false, error: 'not attempted' },
      destination: { ok: false, error: 'not attempted' },
    };

    for (const role of ['source', 'destination'] as const) {
      try {
        await this.authenticate(role, credentials[role]);
        outcomes[role] = { ok: true };
      } catch (error) {
        outcomes[role] = { ok: false, error: errorMessage(error) };
      }
    }

    return outcomes;
  }

  /**
   * List identifiers on the source, reset bulk-action flags and persist the codes file
   */
  async pullIdentifiers(): Promise<string[]> {
    const token = this.requireToken('source');
    const identifiers = await listDatasetIdentifiers(
      this.deps.client,
      token,
      this.session.source.baseUrl,
      this.requestOptions
    );

    this.session.setIdentifiers(identifiers);
    await this.deps.store.saveCodes(identifiers);
    return identifiers;
  }

  /**
   * Fetch one dataset from the source and stage it
   * In migration mode `body`/`bodyMeta` are decoded before staging
   */
  async fetchOne(identifier: string): Promise<DatasetPayload> {
    const token = this.requireToken('source');

    let payload: DatasetPayload;
    try {
      const record = await fetchDataset(
        this.deps.client,
        token,
        this.session.source.baseUrl,
        identifier,
        this.requestOptions
      );
      payload = payloadFromWire(record);
    } catch (error) {
      this.session.markState(identifier, 'failed-at-fetch');
      throw error;
    }
    this.session.markState(identifier, 'fetched');

    if (this.session.mode === 'migration') {
      payload = decodePayload(payload);
    }

    try {
      await this.deps.store.save(identifier, payload);
    } catch (error) {
      this.session.markState(identifier, 'failed-at-stage');
      throw error;
    }
    this.session.markState(identifier, 'staged');

    return payload;
  }

  /**
   * Fetch and stage every given identifier (default: the current listing)
   */
  async fetchAll(identifiers?: readonly string[]): Promise<BatchResult> {
    this.requireToken('source');
    return this.runBatch('fetch', identifiers ?? this.session.listedIdentifiers(), async identifier => {
      await this.fetchOne(identifier);
    });
  }

  /**
   * Local copy of a dataset, fetching a live copy into staging when there is none
   */
  async loadForEditing(identifier: string): Promise<DatasetPayload> {
    const staged = await this.deps.store.load(identifier);
    if (staged) {
      return staged;
    }
    return this.fetchOne(identifier);
  }

  /**
   * Persist hand-edited JSON; the previous copy survives a validation failure
   */
  async saveEdit(identifier: string, text: string): Promise<DatasetPayload> {
    let payload: DatasetPayload;
    try {
      payload = await this.deps.store.saveEdit(identifier, text);
    } catch (error) {
      this.session.markState(identifier, 'failed-at-edit');
      throw error;
    }
    this.session.markState(identifier, 'edited');
    return payload;
  }

  /**
   * Apply transforms to a staged dataset and save the result
   * Runs decode, then substitution, then encode, for whichever are requested
   */
  async applyTransforms(identifier: string, options: TransformOptions): Promise<DatasetPayload> {
    let payload = await this.loadStaged(identifier);
    if (options.decode) payload = decodePayload(payload);
    if (options.substitute) payload = substitutePayload(payload, this.session.rules);
    if (options.encode) payload = encodePayload(payload);

    await this.deps.store.save(identifier, payload);
    this.session.markState(identifier, 'transformed');
    return payload;
  }

  /**
   * Payload as it should be written
   * Migration mode substitutes over the whole record and then encodes; never the other way round
   */
  prepareForUpsert(payload: DatasetPayload): DatasetPayload {
    if (this.session.mode !== 'migration') {
      return payload;
    }
    return encodePayload(substitutePayload(payload, this.session.rules));
  }

  /**
   * Upsert one staged dataset on the destination
   */
  async upsertOne(identifier: string): Promise<UpsertResult> {
    const token = this.requireToken('destination');

    const staged = await this.loadStaged(identifier);
    const prepared = this.prepareForUpsert(staged);
    if (this.session.mode === 'migration') {
      this.session.markState(identifier, 'transformed');
    }

    try {
      const result = await upsertDataset(
        this.deps.client,
        token,
        this.session.destination.baseUrl,
        identifier,
        payloadToWire(prepared),
        this.requestOptions
      );
      this.session.markState(identifier, 'written');
      return result;
    } catch (error) {
      this.session.markState(identifier, 'failed-at-write');
      throw error;
    }
  }

  /**
   * Upsert exactly the named identifiers
   */
  async upsertMany(identifiers: readonly string[]): Promise<BatchResult> {
    this.requireToken('destination');
    return this.runBatch('upsert', identifiers, async identifier => {
      await this.upsertOne(identifier);
    });
  }

  /**
   * Upsert every identifier flagged for deploy
   */
  async upsertSelected(): Promise<BatchResult> {
    return this.upsertMany(this.session.selected('deploy'));
  }

  async deleteOne(identifier: string): Promise<DeleteResult> {
    const token = this.requireToken('destination');
    try {
      const result = await deleteDataset(
        this.deps.client,
        token,
        this.session.destination.baseUrl,
        identifier,
        this.requestOptions
      );
      this.session.markState(identifier, 'deleted');
      return result;
    } catch (error) {
      this.session.markState(identifier, 'failed-at-write');
      throw error;
    }
  }

  /**
   * Delete exactly the named identifiers on the destination
   */
  async deleteMany(identifiers: readonly string[]): Promise<BatchResult> {
    this.requireToken('destination');
    return this.runBatch('delete', identifiers, async identifier => {
      await this.deleteOne(identifier);
    });
  }

  /**
   * Delete every identifier flagged for delete
   */
  async deleteSelected(): Promise<BatchResult> {
    return this.deleteMany(this.session.selected('delete'));
  }

  async removeLocalCopy(identifier: string): Promise<boolean> {
    const removed = await this.deps.store.remove(identifier);
    this.session.markState(identifier, 'pending');
    return removed;
  }

  /**
   * Drop every staged file so nothing leaks into the next environment pair
   */
  async clearWorkspace(): Promise<void> {
    await this.deps.store.clear();
    this.session.resetStates();
  }

  private async loadStaged(identifier: string): Promise<DatasetPayload> {
    let staged: DatasetPayload | null;
    try {
      staged = await this.deps.store.load(identifier);
    } catch (error) {
      this.session.markState(identifier, 'failed-at-stage');
      throw error;
    }
    if (!staged) {
      this.session.markState(identifier, 'failed-at-stage');
      throw new NotStagedError(identifier);
    }
    return staged;
  }

  private async runBatch(
    action: BatchAction,
    identifiers: readonly string[],
    operation: (identifier: string) => Promise<void>
  ): Promise<BatchResult> {
    const outcomes: ItemOutcome[] = [];

    for (const identifier of identifiers) {
      try {
        await operation(identifier);
        outcomes.push({ identifier, state: this.session.stateOf(identifier) });
      } catch (error) {
        const message = errorMessage(error);
        logger.warn(`Dataset ${action} failed`, { identifier, error: message });
        outcomes.push({ identifier, state: this.session.stateOf(identifier), error: message });
      }
    }

    const errorCount = outcomes.filter(outcome => outcome.error !== undefined).length;
    const result: BatchResult = {
      action,
      outcomes,
      successCount: outcomes.length - errorCount,
      errorCount,
    };

    logger.info(`Dataset ${action} batch finished`, {
      total: outcomes.length,
      successCount: result.successCount,
      errorCount,
    });

    return result;
  }
}
