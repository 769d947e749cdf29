import { describe, it, expect } from 'vitest';
import { budgetAlerts, categoryBudgetAlerts, globalBudgetAlerts, isBudgetConfigured } from '../alerts.js';
import { fakeLedger, makeCategory, makeEntry } from './fakeLedger.js';

const JAN = { year: 2025, month: 1 };

const entries = () => [
  makeEntry('2025-01-05', 200, 'Alimentation'),
  makeEntry('2025-01-20', 100, 'Alimentation'),
  makeEntry('2025-01-10', 60, 'Transport'),
  makeEntry('2025-01-12', 40),
];

describe('isBudgetConfigured', () => {
  it('treats null and 0 as unset', () => {
    expect(isBudgetConfigured(null)).toBe(false);
    expect(isBudgetConfigured(0)).toBe(false);
    expect(isBudgetConfigured(0.01)).toBe(true);
  });
});

describe('globalBudgetAlerts', () => {
  it('never alerts without a global budget', () => {
    const ledger = fakeLedger([makeEntry('2025-01-01', 5000)], [], null);
    expect(globalBudgetAlerts(ledger, JAN)).toEqual([]);
  });

  it('never alerts with a zero global budget', () => {
    const ledger = fakeLedger([makeEntry('2025-01-01', 5000)], [], 0);
    expect(globalBudgetAlerts(ledger, JAN)).toEqual([]);
  });

  it('emits one alert when spend exceeds the budget', () => {
    const ledger = fakeLedger(entries(), [], 350);
    expect(globalBudgetAlerts(ledger, JAN)).toEqual([
      { scope: 'global', budget: 350, actual: 400, delta: 50 },
    ]);
  });

  it('does not alert when spend equals the budget', () => {
    const ledger = fakeLedger(entries(), [], 400);
    expect(globalBudgetAlerts(ledger, JAN)).toEqual([]);
  });

  it('rounds monetary values at emission', () => {
    const ledger = fakeLedger([makeEntry('2025-01-01', 40)], [], 33.333);
    expect(globalBudgetAlerts(ledger, JAN)).toEqual([
      { scope: 'global', budget: 33.33, actual: 40, delta: 6.67 },
    ]);
  });
});

describe('categoryBudgetAlerts', () => {
  it('alerts only for configured, exceeded budgets', () => {
    const categories = [
      makeCategory({ id: 'cat-Alimentation', name: 'Alimentation', monthlyBudget: 250 }),
      makeCategory({ id: 'cat-Transport', name: 'Transport', monthlyBudget: null }),
      makeCategory({ id: 'cat-Loisirs', name: 'Loisirs', monthlyBudget: 0 }),
      makeCategory({ id: 'cat-Vacances', name: 'Vacances', monthlyBudget: 10 }),
    ];
    const ledger = fakeLedger(entries(), categories);
    expect(categoryBudgetAlerts(ledger, JAN)).toEqual([
      { scope: 'category', category: 'Alimentation', budget: 250, actual: 300, delta: 50 },
    ]);
  });

  it('a zero category budget never alerts', () => {
    const categories = [makeCategory({ id: 'cat-Transport', name: 'Transport', monthlyBudget: 0 })];
    expect(categoryBudgetAlerts(fakeLedger(entries(), categories), JAN)).toEqual([]);
  });

  it('follows category enumeration order, not severity', () => {
    const categories = [
      makeCategory({ id: 'cat-Transport', name: 'Transport', monthlyBudget: 50 }),
      makeCategory({ id: 'cat-Alimentation', name: 'Alimentation', monthlyBudget: 100 }),
    ];
    const alerts = categoryBudgetAlerts(fakeLedger(entries(), categories), JAN);
    expect(alerts.map((a) => [a.category, a.delta])).toEqual([
      ['Transport', 10],
      ['Alimentation', 200],
    ]);
  });
});

describe('budgetAlerts', () => {
  it('lists the global alert before category alerts', () => {
    const categories = [makeCategory({ id: 'cat-Alimentation', name: 'Alimentation', monthlyBudget: 250 })];
    const ledger = fakeLedger(entries(), categories, 100);
    expect(budgetAlerts(ledger, JAN)).toEqual([
      { scope: 'global', budget: 100, actual: 400, delta: 300 },
      { scope: 'category', category: 'Alimentation', budget: 250, actual: 300, delta: 50 },
    ]);
  });

  it('is empty for a month without spend', () => {
    const categories = [makeCategory({ id: 'cat-Alimentation', name: 'Alimentation', monthlyBudget: 250 })];
    expect(budgetAlerts(fakeLedger(entries(), categories, 100), { year: 2025, month: 2 })).toEqual([]);
  });
});
