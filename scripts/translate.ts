import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createCurationApplication } from './curate';

async function main() {
  const [input, output, ...rest] = process.argv.slice(2);
  if (!input) {
    console.error('usage: translate <input.md> [output.md] [--whole] [--max-chars N]');
    process.exitCode = 2;
    return;
  }
  const whole = rest.includes('--whole');
  const maxIndex = rest.indexOf('--max-chars');
  const maxChars = maxIndex >= 0 ? Number(rest[maxIndex + 1]) : undefined;

  const app = createCurationApplication();
  const text = await readFile(input, 'utf-8');
  const translated = await app.model.translate(text, {
    whole,
    maxChars: maxChars && Number.isFinite(maxChars) ? maxChars : undefined,
  });
  if (translated === null) {
    throw new Error(`Translation failed for ${input}`);
  }

  const target = output && !output.startsWith('--')
    ? output
    : path.join(path.dirname(input), `tr_${path.basename(input)}`);
  await writeFile(target, translated, 'utf-8');
  console.log(JSON.stringify({ level: 'info', message: 'translate.complete', meta: { target } }));
}

main().catch((error) => {
  console.error(
    JSON.stringify({
      level: 'error',
      message: 'translate.failure',
      meta: {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
    }),
  );
  process.exitCode = 1;
});
