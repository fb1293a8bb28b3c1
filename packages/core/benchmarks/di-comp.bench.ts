/*
 * DI Comparison Benchmark (tinybench)
 * Purpose: comparable value-lookup workloads across DI libs using request-like
 *          child scopes and pre-built singletons.
 * Notes:
 * - Only constructs every lib supports: constant values bound to tokens and
 *   child containers. No decorators, no constructor injection.
 * - Measures: cold boot, root lookup, request cycle (child + bind + 2 lookups).
 */

import 'reflect-metadata';
import { Bench } from 'tinybench';

import { container as tsyringe } from 'tsyringe';
import { Container as Inversify } from 'inversify';
import { Container as TypeDIContainer, Token as TypeDIToken } from 'typedi';

import { createRuntime } from '../src/core/runtime.js';
import { Scope } from '../src/core/scope.js';
import { token } from '../src/core/token.js';

// ╭──────────────────────────────────────────────────────────────────────────╮
// │ Shared scenario                                                         │
// ╰──────────────────────────────────────────────────────────────────────────╯
// 50 infrastructure singletons live in the root. Each request opens a child,
// binds its request id, reads it back and reads one root singleton.

const SERVICE_COUNT = 50;
const HOT = 25;

interface Service {
  readonly id: number;
}

const services: Service[] = Array.from({ length: SERVICE_COUNT }, (_, id) => ({ id }));

interface Adapter {
  name: string;
  coldBoot(): void; // registration of all services into a fresh root
  rootLookup(): Service; // one singleton from the root
  requestCycle(requestId: number): number; // child scope, bind, two lookups, teardown
}

// ╭──────────────────────────────────────────────────────────────────────────╮
// │ Adapters                                                                │
// ╰──────────────────────────────────────────────────────────────────────────╯

function arborAdapter(): Adapter {
  const tokens = services.map((s) => token<Service>(`Service${s.id}`));
  const RequestIdT = token<number>('RequestId');
  const runtime = createRuntime({ environment: 'production' });
  let root = new Scope({ name: 'root', runtime });

  const boot = () => {
    root.dispose();
    root = new Scope({ name: 'root', runtime });
    services.forEach((s, i) => root.register(tokens[i], s));
  };
  boot();

  return {
    name: 'Arbor',
    coldBoot: boot,
    rootLookup: () => root.findRequired(tokens[HOT]),
    requestCycle(requestId) {
      const request = root.createChild('request');
      request.register(RequestIdT, requestId);
      const id = request.findRequired(RequestIdT) + request.findRequired(tokens[HOT]).id;
      request.dispose();
      return id;
    },
  };
}

function tsyringeAdapter(): Adapter {
  const tokens = services.map((s) => Symbol(`Service${s.id}`));
  const RequestId = Symbol('RequestId');
  let root = tsyringe.createChildContainer();

  const boot = () => {
    root = tsyringe.createChildContainer();
    services.forEach((s, i) => root.registerInstance(tokens[i], s));
  };
  boot();

  return {
    name: 'tsyringe',
    coldBoot: boot,
    rootLookup: () => root.resolve<Service>(tokens[HOT]),
    requestCycle(requestId) {
      const request = root.createChildContainer();
      request.registerInstance(RequestId, requestId);
      return request.resolve<number>(RequestId) + request.resolve<Service>(tokens[HOT]).id;
    },
  };
}

function inversifyAdapter(): Adapter {
  const tokens = services.map((s) => Symbol(`Service${s.id}`));
  const RequestId = Symbol('RequestId');
  let root = new Inversify();

  const boot = () => {
    root = new Inversify();
    services.forEach((s, i) => root.bind<Service>(tokens[i]).toConstantValue(s));
  };
  boot();

  return {
    name: 'Inversify',
    coldBoot: boot,
    rootLookup: () => root.get<Service>(tokens[HOT]),
    requestCycle(requestId) {
      const request = root.createChild();
      request.bind<number>(RequestId).toConstantValue(requestId);
      return request.get<number>(RequestId) + request.get<Service>(tokens[HOT]).id;
    },
  };
}

// TypeDI containers do not inherit from each other; the request reads the
// singleton from the root explicitly.
function typediAdapter(): Adapter {
  const tokens = services.map((s) => new TypeDIToken<Service>(`Service${s.id}`));
  const RequestId = new TypeDIToken<number>('RequestId');
  let generation = 0;
  let root = TypeDIContainer.of(`bench-${generation}`);

  const boot = () => {
    TypeDIContainer.reset(`bench-${generation}`);
    generation++;
    root = TypeDIContainer.of(`bench-${generation}`);
    services.forEach((s, i) => root.set(tokens[i], s));
  };
  boot();

  return {
    name: 'TypeDI',
    coldBoot: boot,
    rootLookup: () => root.get(tokens[HOT]),
    requestCycle(requestId) {
      const request = TypeDIContainer.of('bench-request');
      request.set(RequestId, requestId);
      const id = request.get(RequestId) + root.get(tokens[HOT]).id;
      TypeDIContainer.reset('bench-request');
      return id;
    },
  };
}

// ╭──────────────────────────────────────────────────────────────────────────╮
// │ Runner                                                                  │
// ╰──────────────────────────────────────────────────────────────────────────╯

const PHASES = ['Cold boot', 'Root lookup', 'Request cycle'] as const;

async function main() {
  const adapters = [arborAdapter(), tsyringeAdapter(), inversifyAdapter(), typediAdapter()];
  const bench = new Bench({ time: 1000 });
  let sink = 0;
  let requestId = 0;

  for (const a of adapters) {
    bench.add(`${a.name}: Cold boot`, () => {
      a.coldBoot();
    });
  }
  for (const a of adapters) {
    bench.add(`${a.name}: Root lookup`, () => {
      sink += a.rootLookup().id;
    });
  }
  for (const a of adapters) {
    bench.add(`${a.name}: Request cycle`, () => {
      sink += a.requestCycle(++requestId);
    });
  }

  await bench.run();
  console.table(bench.table());

  console.log('\n=== Summary (lower is better) ===');
  const periodMs = (name: string) => bench.tasks.find((t) => t.name === name)?.result?.period ?? NaN;

  for (const phase of PHASES) {
    console.log(`\n-- ${phase}`);
    const rows = adapters.map((a) => ({ name: a.name, ms: periodMs(`${a.name}: ${phase}`) }));
    rows.forEach((r) => console.log(`${r.name.padEnd(12)} ${(r.ms * 1_000_000).toFixed(0)}ns`));

    const base = rows.find((r) => r.name === 'Arbor');
    if (!base) continue;
    for (const r of rows) {
      if (r === base) continue;
      if (!(base.ms > 0 && r.ms > 0)) {
        console.log(`  Arbor vs ${r.name}: n/a`);
      } else if (base.ms <= r.ms) {
        console.log(`  Arbor vs ${r.name}: ${(r.ms / base.ms).toFixed(2)}x faster`);
      } else {
        console.log(`  Arbor vs ${r.name}: ${(base.ms / r.ms).toFixed(2)}x slower`);
      }
    }
  }

  console.log(`\nBenchmark complete (sink: ${sink})`);
}

main().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
