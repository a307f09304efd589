#!/usr/bin/env node
import { main } from './main';

const start = async () => {
  process.exitCode = await main(process.argv.slice(2));
};

void start();
