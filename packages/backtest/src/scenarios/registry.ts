/**
 * Predefined stress scenarios
 */

import type { Scenario } from '@stratgate/core';

export const SCENARIO_2008_CRISIS: Scenario = {
  scenario_id: '2008_crisis',
  name: '2008 Financial Crisis',
  description: 'Financial crisis period from October 2007 to March 2009',
  start_date: '2007-10-01',
  end_date: '2009-03-31',
  tags: ['crisis', 'volatility', 'bear_market', 'financial'],
};

export const SCENARIO_2020_COVID: Scenario = {
  scenario_id: '2020_covid',
  name: '2020 COVID-19 Pandemic',
  description: 'COVID-19 market crash and recovery period from February to June 2020',
  start_date: '2020-02-01',
  end_date: '2020-06-30',
  tags: ['crisis', 'volatility', 'pandemic', 'bear_market'],
};

export const SCENARIO_2022_BEAR: Scenario = {
  scenario_id: '2022_bear',
  name: '2022 Bear Market',
  description: 'Bear market period in 2022 with inflation concerns and rate hikes',
  start_date: '2022-01-01',
  end_date: '2022-12-31',
  tags: ['bear_market', 'volatility', 'inflation'],
};

const PREDEFINED_SCENARIOS: ReadonlyMap<string, Scenario> = new Map(
  [SCENARIO_2008_CRISIS, SCENARIO_2020_COVID, SCENARIO_2022_BEAR].map((scenario) => [
    scenario.scenario_id,
    scenario,
  ])
);

export function getScenario(scenarioId: string): Scenario | undefined {
  const scenario = PREDEFINED_SCENARIOS.get(scenarioId);
  return scenario ? { ...scenario, tags: [...scenario.tags] } : undefined;
}

/**
 * All scenarios, or only those carrying every one of `tags`
 */
export function listScenarios(tags: string[] = []): Scenario[] {
  return Array.from(PREDEFINED_SCENARIOS.values())
    .filter((scenario) => tags.every((tag) => scenario.tags.includes(tag)))
    .map((scenario) => ({ ...scenario, tags: [...scenario.tags] }));
}
