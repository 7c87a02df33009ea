import { main } from './cli.ts';

main({ argv: process.argv.slice(2), env: process.env }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Band monitor crashed:', error);
    process.exitCode = 1;
  }
);
