#!/usr/bin/env node
import { main } from './main';

try {
  main();
} catch (err) {
  console.error('Error:', err);
  process.exit(1);
}
