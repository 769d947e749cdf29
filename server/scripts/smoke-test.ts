/**
 * Minimal API smoke test script
 * Run with: npm run smoke (requires the API server running, default port 8787)
 */

export {};

const API_BASE = process.env.API_BASE ?? 'http://localhost:8787';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson(url: string, options?: RequestInit): Promise<unknown> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return response.json();
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Object.getOwnPropertyDescriptor(value, key)?.value : undefined;
}

async function runTests(): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');

  await test('GET /health returns healthy', async () => {
    const result = await fetchJson(`${API_BASE}/health`);
    if (field(result, 'status') !== 'healthy') throw new Error('Expected status: healthy');
  });

  const categoryName = `smoke-${Date.now()}`;
  let categoryId: unknown;

  await test('POST /api/categories creates category', async () => {
    const result = await fetchJson(`${API_BASE}/api/categories`, {
      method: 'POST',
      body: JSON.stringify({ name: categoryName, color: '#336699', monthly_budget: 10 }),
    });
    categoryId = field(result, 'id');
    if (typeof categoryId !== 'string') throw new Error(`Expected id, got: ${JSON.stringify(result)}`);
  });

  await test('POST /api/categories rejects duplicate name with 409', async () => {
    const response = await fetch(`${API_BASE}/api/categories`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: categoryName }),
    });
    if (response.status !== 409) throw new Error(`Expected 409, got ${response.status}`);
  });

  await test('POST /api/import/csv imports rows', async () => {
    const csv = [
      'date,description,amount,category',
      `2024-01-15,smoke groceries,45.50,${categoryName}`,
      'not-a-date,broken row,10,',
    ].join('\n');
    const result = await fetchJson(`${API_BASE}/api/import/csv`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: csv,
    });
    if (field(result, 'inserted') !== 1 || field(result, 'skipped') !== 1) {
      throw new Error(`Unexpected report: ${JSON.stringify(result)}`);
    }
  });

  await test('GET /api/alerts reports the category overage', async () => {
    const result = await fetchJson(`${API_BASE}/api/alerts?year=2024&month=1`);
    const alerts = field(result, 'alerts');
    if (!Array.isArray(alerts)) throw new Error('Expected alerts array');
    if (!alerts.some((a) => field(a, 'category') === categoryName)) {
      throw new Error(`No alert for ${categoryName}`);
    }
  });

  await test('DELETE /api/categories/:id detaches transactions', async () => {
    const response = await fetch(`${API_BASE}/api/categories/${String(categoryId)}`, { method: 'DELETE' });
    if (response.status !== 204) throw new Error(`Expected 204, got ${response.status}`);
  });

  // Summary
  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

// Check if API is reachable before running tests
async function checkApiReachable(): Promise<boolean> {
  try {
    const response = await fetch(`${API_BASE}/health`);
    return response.ok;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  console.log('Checking if API server is running...');

  const reachable = await checkApiReachable();
  if (!reachable) {
    console.error(`\nError: API server not reachable at ${API_BASE}`);
    console.error('Please start the server with: npm run dev\n');
    process.exit(1);
  }

  await runTests();
}

main().catch((error: unknown) => {
  console.error('Smoke test crashed:', error);
  process.exit(1);
});
