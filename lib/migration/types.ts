/**
 * Dataset migration types
 * Modes, per-item states and batch results for the migration pipeline
 */

/**
 * - standard: stage records exactly as received; transforms only on request
 * - migration: decode on fetch; substitute then encode right before upsert
 */
export type PipelineMode = 'standard' | 'migration';

export type BulkAction = 'deploy' | 'delete';

/**
 * Stage at which an item can fail
 */
export type PipelineStage = 'fetch' | 'stage' | 'edit' | 'transform' | 'write';

export type ItemState =
  | 'pending'
  | 'fetched'
  | 'staged'
  | 'edited'
  | 'transformed'
  | 'written'
  | 'deleted'
  | `failed-at-${PipelineStage}`;

export type BatchAction = 'fetch' | 'upsert' | 'delete';

/**
 * Outcome of one item in a batch
 */
export interface ItemOutcome {
  identifier: string;
  state: ItemState;
  error?: string;
}

/**
 * Batch result: one outcome per item, never all-or-nothing
 */
export interface BatchResult {
  action: BatchAction;
  outcomes: ItemOutcome[];
  successCount: number;
  errorCount: number;
}

export interface TransformOptions {
  decode?: boolean;
  substitute?: boolean;
  encode?: boolean;
}
