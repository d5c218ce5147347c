/**
 * Querywise - Query Pipeline Service
 *
 * Sequences generation, heuristic fixing, validation, execution and
 * summarization for one question. A validation failure and an execution
 * failure each get at most one repair, and nothing reaches the database
 * without passing the validator.
 */

import { logPipeline, type PipelineLogData } from '../utils/logger.js';
import { ConfigurationError } from '../utils/types.js';
import { emptyResultsEnvelope, errorEnvelope, successEnvelope } from './envelope.js';
import { fixQuery } from './heuristic-fixer.js';
import type {
  CandidateGenerator,
  PipelineResult,
  QueryExecutorLike,
  QueryRepairer,
  RequestContext,
  ResultSummarizerLike,
  Row,
  SchemaSnapshot,
  SchemaSnapshotSource,
} from './types.js';
import { validateQuery } from './validator.js';

export interface QueryServiceDeps {
  schema: SchemaSnapshotSource;
  generator: CandidateGenerator;
  repairer: QueryRepairer;
  executor: QueryExecutorLike;
  summarizer: ResultSummarizerLike;
}

export class QueryService {
  private deps: QueryServiceDeps;

  constructor(deps: QueryServiceDeps) {
    this.deps = deps;
  }

  async process(question: string, context: RequestContext): Promise<PipelineResult> {
    const startTime = Date.now();
    try {
      const result = await this.run(question, context);
      logPipeline({
        requestId: context.requestId,
        customerId: context.customerId,
        stage: result.success ? 'summarized' : 'failed',
        query: result.success ? result.query : undefined,
        error: result.success ? undefined : result.error.type,
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logPipeline({
        requestId: context.requestId,
        customerId: context.customerId,
        stage: 'failed',
        error: message,
        durationMs: Date.now() - startTime,
      });

      if (error instanceof ConfigurationError) {
        return errorEnvelope('configuration_error', error.message);
      }
      return errorEnvelope('general_error');
    }
  }

  private async run(question: string, context: RequestContext): Promise<PipelineResult> {
    const { generator, executor } = this.deps;
    const snapshot = this.deps.schema.current();
    const log = (stage: PipelineLogData['stage'], query?: string, error?: string): void =>
      this.log(context, stage, query, error);

    // Generate
    const generated = await generator.generate(question, snapshot, context);
    if (!generated.ok) {
      return errorEnvelope('sql_generation_failed', generated.error);
    }
    log('generated', generated.query);

    // Heuristic fix
    const fixed = fixQuery(generated.query, snapshot.tables);
    if (fixed.changed) {
      log('heuristic_fixed', fixed.query);
    }

    // Validate, with one repair
    let query: string;
    let originalQuery: string | undefined;

    const validation = validateQuery(fixed.query);
    if (validation.valid) {
      query = validation.statement;
    } else {
      log('invalid', fixed.query, validation.reason);
      const repaired = await this.repairChecked(fixed.query, snapshot, validation.reason, context);
      if (repaired === null) {
        return errorEnvelope('sql_validation_failed', validation.reason);
      }
      originalQuery = fixed.query;
      query = repaired;
    }
    log('validated', query);

    // Execute, with one repair
    const executed = await executor.execute(query);
    if (executed.ok) {
      log('executed', query);
      return this.finish(question, query, executed.rows, originalQuery, context);
    }

    const executionError = executed.error.message;
    log('execution_failed', query, executionError);

    const repaired = await this.repairChecked(query, snapshot, executionError, context);
    if (repaired === null) {
      return errorEnvelope('execution_error', executionError);
    }

    // Executed once; a failure here is terminal
    const retried = await executor.execute(repaired);
    if (!retried.ok) {
      log('execution_failed', repaired, retried.error.message);
      return errorEnvelope('execution_error', executionError);
    }
    log('executed', repaired);

    return this.finish(question, repaired, retried.rows, originalQuery ?? query, context);
  }

  /**
   * One repair attempt. Returns the executable statement of the repaired
   * query, or null when the repair failed or the result does not validate.
   */
  private async repairChecked(
    query: string,
    snapshot: SchemaSnapshot,
    error: string,
    context: RequestContext
  ): Promise<string | null> {
    const repaired = await this.deps.repairer.repair(query, snapshot, error, context);
    if (!repaired.ok) {
      this.log(context, 'debug_attempted', query, repaired.error);
      return null;
    }

    const validation = validateQuery(repaired.fixedQuery);
    if (!validation.valid) {
      this.log(context, 'debug_attempted', repaired.fixedQuery, validation.reason);
      return null;
    }
    this.log(context, 'debug_attempted', validation.statement);
    return validation.statement;
  }

  private log(
    context: RequestContext,
    stage: PipelineLogData['stage'],
    query?: string,
    error?: string
  ): void {
    logPipeline({ requestId: context.requestId, customerId: context.customerId, stage, query, error });
  }

  private async finish(
    question: string,
    query: string,
    rows: Row[],
    originalQuery: string | undefined,
    context: RequestContext
  ): Promise<PipelineResult> {
    if (rows.length === 0) {
      return emptyResultsEnvelope(query, originalQuery);
    }
    const summary = await this.deps.summarizer.summarize(question, query, rows, context);
    return successEnvelope({ query, rows, summary, originalQuery });
  }
}
