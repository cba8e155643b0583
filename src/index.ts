import { main } from './cli';

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((e) => {
    console.error('Unexpected error:', e);
    process.exit(1);
  });
