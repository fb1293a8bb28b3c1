/**
 * Scope Lookup Benchmark
 *
 * Measures the hot paths of a scope tree:
 * 1. Local hit: value bound in the scope being asked
 * 2. Parent walk: value bound three levels up
 * 3. Lazy singleton after materialization
 * 4. Always-new factory
 * 5. Request cycle: create child, bind, look up, dispose
 */

import { Bench } from 'tinybench';
import { createRuntime } from '../src/core/runtime.js';
import { Scope } from '../src/core/scope.js';
import { token } from '../src/core/token.js';

interface Config {
  url: string;
}

class Session {
  constructor(readonly user: string) {}
}

const ConfigT = token<Config>('Config');
const SessionT = token<Session>('Session');
const RequestIdT = token<number>('RequestId');
const CounterT = token<number>('Counter');

const runtime = createRuntime({ environment: 'production' });
const root = new Scope({ name: 'root', runtime });
root.register(ConfigT, { url: 'http://localhost' }, { permanent: true });
root.lazily(SessionT, () => new Session('test-user'));
let counter = 0;
root.putFactory(CounterT, () => ++counter);

const feature = root.createChild('feature');
const page = feature.createChild('page');
const leaf = page.createChild('leaf');
leaf.register(RequestIdT, 1);
root.find(SessionT);

// ==================== Benchmark ====================

const bench = new Bench({ time: 1000 });

bench
  .add('local hit', () => {
    leaf.find(RequestIdT);
  })
  .add('parent walk (3 levels)', () => {
    leaf.find(ConfigT);
  })
  .add('lazy singleton (materialized)', () => {
    leaf.find(SessionT);
  })
  .add('always-new factory', () => {
    root.find(CounterT);
  })
  .add('miss (whole chain)', () => {
    leaf.find(token('Missing'));
  })
  .add('request cycle', () => {
    const request = root.createChild('request');
    request.register(RequestIdT, 2);
    request.find(RequestIdT);
    request.find(ConfigT);
    request.dispose();
  });

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Scope Lookup Performance Results');
console.log('='.repeat(80) + '\n');

console.table(bench.table());

const local = bench.tasks.find((t) => t.name === 'local hit');
const walk = bench.tasks.find((t) => t.name === 'parent walk (3 levels)');

if (local?.result?.period && walk?.result?.period) {
  const perLevel = (((walk.result.period - local.result.period) / 3) * 1_000_000).toFixed(2);
  console.log(`\nParent walk cost: ${perLevel}ns per level`);
}
