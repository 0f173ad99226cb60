import { config } from '@api/config';
import { main } from './commands';

main(process.argv.slice(2), {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  journalPath: config.journal.path,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[CLI] Fatal:', err);
    process.exitCode = 1;
  });
