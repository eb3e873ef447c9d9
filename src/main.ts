#!/usr/bin/env node
import * as readline from 'readline';
import { CheckoutEngine } from './checkout';
import { InputClosedError, runCli, type Terminal } from './cli';
import { loadConfig } from './config';
import { openMarketData } from './data';
import { getErrorMessage } from './errors';
import { log, setLogLevel } from './log';
import { PromotionCatalog, defaultPromotions } from './promotions';

interface ClosableTerminal extends Terminal {
  close(): void;
}

function createTerminal(): ClosableTerminal {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  let pending: ((err: Error) => void) | null = null;

  rl.on('close', () => {
    closed = true;
    pending?.(new InputClosedError());
    pending = null;
  });

  return {
    ask: (question) =>
      new Promise<string>((resolve, reject) => {
        if (closed) {
          reject(new InputClosedError());
          return;
        }
        pending = reject;
        rl.question(question, (answer) => {
          pending = null;
          resolve(answer);
        });
      }),
    print: (line = '') => {
      process.stdout.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const data = await openMarketData(config.dataDir, config.staffEmailDomain);
  const promotions = new PromotionCatalog(defaultPromotions(config.staffEmailDomain));
  const engine = new CheckoutEngine({
    products: data.products,
    users: data.users,
    orders: data.orders,
    pickupStores: data.pickupStores,
    promotions,
  });

  const terminal = createTerminal();
  try {
    await runCli(terminal, { data, engine, promotions });
  } finally {
    terminal.close();
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    log({ level: 'error', action: 'app.fatal', error: getErrorMessage(err) });
    process.stderr.write(`campus-market: ${getErrorMessage(err)}\n`);
    process.exit(1);
  },
);
