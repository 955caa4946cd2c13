#!/usr/bin/env node
import { consolePresenter, runCli } from './index';

const controller = new AbortController();
const stop = () => controller.abort();
process.once('SIGINT', stop);
process.once('SIGTERM', stop);

void runCli(process.argv.slice(2), { presenter: consolePresenter(), signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`${String(err)}\n`);
    process.exitCode = 1;
  })
  .finally(() => {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  });
