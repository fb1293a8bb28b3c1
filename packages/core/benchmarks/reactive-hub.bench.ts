/**
 * Reactive Hub Benchmark
 *
 * Notification fan-out for 1, 10 and 100 listeners on one key, plus the
 * subscribe/dispose cycle and raw-key signals.
 */

import { Bench } from 'tinybench';
import { createContainer } from '../src/api/container.js';
import { token } from '../src/core/token.js';

const CountT = token<number>('Count');
const ONE = token<number>('One');
const TEN = token<number>('Ten');
const HUNDRED = token<number>('Hundred');

const app = createContainer({ environment: 'production', hub: { maxListenersPerKey: 1000 } });
let sink = 0;
const listener = (value: number | undefined) => {
  sink += value ?? 0;
};

for (const [key, count] of [
  [ONE, 1],
  [TEN, 10],
  [HUNDRED, 100],
] as const) {
  app.put(key, 1);
  for (let i = 0; i < count; i++) app.listen(key, listener);
}
app.hub.listenKey('tick', () => {
  sink++;
});

const bench = new Bench({ time: 1000 });

bench
  .add('notify: 1 listener', () => {
    app.notify(ONE);
  })
  .add('notify: 10 listeners', () => {
    app.notify(TEN);
  })
  .add('notify: 100 listeners', () => {
    app.notify(HUNDRED);
  })
  .add('notify: no listeners', () => {
    app.notify(CountT);
  })
  .add('put + notify', () => {
    app.put(ONE, 2);
  })
  .add('raw key signal', () => {
    app.hub.notifyKey('tick');
  })
  .add('listen + dispose', () => {
    app.listen(CountT, listener).dispose();
  });

await bench.run();

console.table(bench.table());
console.log(`\nHub stats: ${JSON.stringify(app.getStats().hub)}`);
console.log(`(sink: ${sink})`);

await app.dispose();
