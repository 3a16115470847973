/**
 * List Scenarios Handler
 *
 * Pure handler - no console.log, no process.exit.
 */

import { listScenarios } from '@stratgate/backtest';
import type { ScenariosArgs } from '../../command-defs/strategy.js';

export interface ScenarioRow {
  scenario_id: string;
  name: string;
  start_date: string;
  end_date: string;
  tags: string;
}

export function listScenariosHandler(args: ScenariosArgs): ScenarioRow[] {
  return listScenarios(args.tags).map((scenario) => ({
    scenario_id: scenario.scenario_id,
    name: scenario.name,
    start_date: scenario.start_date,
    end_date: scenario.end_date,
    tags: scenario.tags.join(','),
  }));
}
