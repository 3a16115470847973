/**
 * Strategy Pipeline
 * =================
 * Orchestrates one strategy candidate end to end:
 *
 *   bars → data quality → backtest (+ walk-forward, + scenario gating)
 *        → order generation → risk assessment → execution with failover → sink
 *
 * Every decision is made by the stage components; the pipeline only wires
 * them and keeps upstream results when a downstream stage fails.
 */

import { randomUUID } from 'crypto';
import {
  ConfigurationError,
  ValidationError,
  createLogger,
  safeAsync,
} from '@stratgate/utils';
import {
  StrategySpecSchema,
  getActiveRunRegistry,
  getKillSwitch,
  type ActiveRunRegistry,
  type Bar,
  type BarInput,
  type BarsBySymbol,
  type CandidateResult,
  type Fill,
  type GatingResult,
  type GatingRule,
  type KillSwitch,
  type Order,
  type PortfolioState,
  type QualityReport,
  type ResultSinkPort,
  type Scenario,
  type StageError,
  type StrategySpec,
  type StrategySpecInput,
  type TransactionCosts,
  type WalkForwardResult,
} from '@stratgate/core';
import {
  Backtester,
  DEFAULT_INITIAL_CAPITAL,
  DataQualityChecker,
  ScenarioGatingEngine,
  WalkForwardValidator,
  assertRuleSupported,
  getDefaultGatingRules,
  listScenarios,
  type ValidationConfigInput,
} from '@stratgate/backtest';
import {
  ExecutionGuard,
  OrderGenerator,
  RiskEngine,
  getBrokerManager,
  type BrokerManager,
  type PriceMap,
} from '@stratgate/trading';

const logger = createLogger('workflows:pipeline');

/**
 * Scenario gating request; omitted fields use the registry and default rules
 */
export interface GatingOptions {
  scenarios?: Scenario[];
  rules?: GatingRule[];
}

export interface PipelineOptions {
  /** Run walk-forward validation with this configuration */
  validation?: ValidationConfigInput;
  /** Run scenario gating */
  gating?: GatingOptions;
  costs?: Partial<TransactionCosts>;
  /** Account equity history for the drawdown breaker */
  equityCurve?: number[];
  /** Block execution unless gating ran and passed (default true when gating runs) */
  requireGatingPass?: boolean;
  verifyFills?: boolean;
  runId?: string;
  /** Rows as received, before incomplete ones were dropped; the quality check reads these when given */
  rawBars?: Record<string, BarInput[]>;
}

/**
 * Stage components; anything omitted uses the default implementation
 */
export interface StrategyPipelineDeps {
  dataQuality?: DataQualityChecker;
  backtester?: Backtester;
  validator?: WalkForwardValidator;
  gatingEngine?: ScenarioGatingEngine;
  orderGenerator?: OrderGenerator;
  riskEngine?: RiskEngine;
  executionGuard?: ExecutionGuard;
  brokerManager?: BrokerManager;
  killSwitch?: KillSwitch;
  activeRuns?: ActiveRunRegistry;
  sink?: ResultSinkPort;
}

interface ExecutionOutcome {
  fills: Fill[];
  error?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Close of the most recent bar per symbol, whatever the input order
 */
export function latestPrices(barsBySymbol: BarsBySymbol): PriceMap {
  const prices: PriceMap = {};
  for (const [symbol, bars] of Object.entries(barsBySymbol)) {
    let latest: Bar | undefined;
    for (const bar of bars) {
      if (!latest || bar.timestamp > latest.timestamp) latest = bar;
    }
    if (latest) prices[symbol] = latest.close;
  }
  return prices;
}

export class StrategyPipeline {
  private readonly dataQuality: DataQualityChecker;
  private readonly backtester: Backtester;
  private readonly validator: WalkForwardValidator;
  private readonly gatingEngine: ScenarioGatingEngine;
  private readonly orderGenerator: OrderGenerator;
  private readonly deps: StrategyPipelineDeps;

  constructor(deps: StrategyPipelineDeps = {}) {
    this.deps = deps;
    this.dataQuality = deps.dataQuality ?? new DataQualityChecker();
    this.backtester = deps.backtester ?? new Backtester();
    this.validator = deps.validator ?? new WalkForwardValidator(this.backtester);
    this.gatingEngine = deps.gatingEngine ?? new ScenarioGatingEngine(this.backtester);
    this.orderGenerator = deps.orderGenerator ?? new OrderGenerator();
  }

  /**
   * Evaluate a strategy and, when asked and allowed, execute its approved orders.
   *
   * Throws only before any work is done (kill switch, invalid strategy) or on a
   * configuration error; every later failure is recorded in the result.
   */
  async evaluateAndExecute(
    strategyInput: StrategySpecInput,
    marketData: BarsBySymbol,
    portfolio: PortfolioState | undefined,
    shouldExecute: boolean,
    options: PipelineOptions = {}
  ): Promise<CandidateResult> {
    // 1. Kill switch, read once
    (this.deps.killSwitch ?? getKillSwitch()).assertInactive();

    const runId = options.runId ?? randomUUID();
    const activeRuns = this.deps.activeRuns ?? getActiveRunRegistry();

    // 2. Track the run for observability
    activeRuns.add(runId);
    try {
      const result = await this.run(runId, strategyInput, marketData, portfolio, shouldExecute, options);

      // 11. Best-effort persistence
      const sink = this.deps.sink;
      if (sink) {
        await safeAsync(() => sink.save(result), undefined, { runId, stage: 'persistence' });
      }
      return result;
    } finally {
      activeRuns.remove(runId);
    }
  }

  private async run(
    runId: string,
    strategyInput: StrategySpecInput,
    marketData: BarsBySymbol,
    portfolioInput: PortfolioState | undefined,
    shouldExecute: boolean,
    options: PipelineOptions
  ): Promise<CandidateResult> {
    // 3. Strategy validation
    const parsed = StrategySpecSchema.safeParse(strategyInput);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid strategy: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
        { runId }
      );
    }
    const strategy = parsed.data;
    for (const rule of strategy.rules) {
      assertRuleSupported(rule);
    }
    const costs = options.costs ?? {};
    const stageErrors: StageError[] = [];

    logger.info('Starting pipeline run', {
      runId,
      strategyId: strategy.strategy_id,
      symbols: Object.keys(marketData).length,
      shouldExecute,
    });

    // 4. Data quality (advisory)
    const dataQuality: Record<string, QualityReport> = {};
    const qualityInput: Record<string, BarInput[]> = options.rawBars ?? marketData;
    for (const [symbol, bars] of Object.entries(qualityInput)) {
      const report = this.dataQuality.validate(bars);
      dataQuality[symbol] = report;
      if (report.status !== 'pass') {
        logger.warn('Data quality issues', { runId, symbol, status: report.status });
      }
    }

    // 5. Whole-range backtest
    const backtest = this.backtester.run(strategy, marketData, costs);

    // 6. Walk-forward validation
    let validation: WalkForwardResult | undefined;
    if (options.validation) {
      try {
        validation = this.validator.run(strategy, marketData, costs, options.validation);
      } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        stageErrors.push({ stage: 'validation', error: errorMessage(error) });
        logger.error('Walk-forward validation failed', error, { runId });
      }
    }

    // 7. Scenario gating
    let gating: GatingResult | undefined;
    if (options.gating) {
      try {
        gating = this.gatingEngine.evaluate(
          strategy,
          options.gating.scenarios ?? listScenarios(),
          marketData,
          options.gating.rules ?? getDefaultGatingRules(),
          costs
        );
      } catch (error) {
        stageErrors.push({ stage: 'gating', error: errorMessage(error) });
        logger.error('Scenario gating failed', error, { runId });
      }
    }

    // 8. Orders from backtest signals and holdings
    const portfolio = portfolioInput ?? { cash: DEFAULT_INITIAL_CAPITAL, positions: [] };
    const prices = latestPrices(marketData);
    const proposedOrders = this.orderGenerator.generate(strategy, portfolio, prices, backtest.trade_log);

    // 9. Risk assessment
    const riskEngine = this.deps.riskEngine ?? new RiskEngine();
    const risk = riskEngine.assess(portfolio, proposedOrders, prices, options.equityCurve, { strategy });

    // 10. Execution
    let execution: ExecutionOutcome = { fills: [] };
    if (shouldExecute && risk.approved_trades.length > 0) {
      execution = await this.execute(runId, strategy, risk.approved_trades, gating, options);
    } else if (shouldExecute) {
      logger.info('No approved orders to execute', { runId, riskLevel: risk.risk_level });
    }

    logger.info('Pipeline run complete', {
      runId,
      proposed: proposedOrders.length,
      approved: risk.approved_trades.length,
      fills: execution.fills.length,
      stageErrors: stageErrors.length,
    });

    return {
      run_id: runId,
      strategy,
      data_quality: dataQuality,
      backtest,
      ...(validation ? { validation } : {}),
      ...(gating ? { gating } : {}),
      proposed_orders: proposedOrders,
      risk,
      execution_fills: execution.fills,
      ...(execution.error !== undefined ? { execution_error: execution.error } : {}),
      stage_errors: stageErrors,
    };
  }

  private async execute(
    runId: string,
    strategy: StrategySpec,
    orders: Order[],
    gating: GatingResult | undefined,
    options: PipelineOptions
  ): Promise<ExecutionOutcome> {
    const requireGatingPass = options.requireGatingPass ?? true;
    if (requireGatingPass && options.gating) {
      if (!gating) {
        return { fills: [], error: 'Scenario gating did not complete; execution skipped' };
      }
      if (!gating.overall_passed) {
        return { fills: [], error: 'Scenario gating did not pass; execution skipped' };
      }
    }

    try {
      (this.deps.executionGuard ?? new ExecutionGuard()).assertAllowed({ runId, strategyId: strategy.strategy_id });
      const broker = await (this.deps.brokerManager ?? getBrokerManager()).getBroker();
      logger.info('Executing approved orders', { runId, broker: broker.name, orders: orders.length });
      const fills = await broker.executeOrders(orders, { verifyFills: options.verifyFills ?? true });
      return { fills };
    } catch (error) {
      logger.error('Execution failed', error, { runId });
      return { fills: [], error: errorMessage(error) };
    }
  }
}
