/**
 * mergeCorpus.ts: Fold a freshly crawled corpus into a long-lived one.
 *
 *   tsx src/tools/mergeCorpus.ts --existing data/corpus.json \
 *       --incoming out/run.json [--out data/merged.json] [--prefer-new]
 *
 * Without `--out` the existing file is rewritten in place (atomically).
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { loadCrawlerConfig } from '../core/types';
import { mergeCorpora, summarizeCorpus } from '../services/corpusFile';

const USAGE =
  'Usage: tsx src/tools/mergeCorpus.ts --existing <file> --incoming <file> ' +
  '[--out <file>] [--prefer-new]';

async function main(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      existing: { type: 'string' },
      incoming: { type: 'string' },
      out: { type: 'string' },
      'prefer-new': { type: 'boolean' },
    },
  });

  if (!values.existing || !values.incoming) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const preferNew = values['prefer-new'] ?? loadCrawlerConfig().preferNew;
  const result = await mergeCorpora(
    values.existing,
    values.incoming,
    preferNew,
    values.out ?? values.existing,
  );

  const summary = summarizeCorpus(result.corpus);
  console.log(
    `\n✓ Merged: ${result.added} added, ${result.replaced} replaced, ` +
      `${result.droppedIds.length} dropped from the existing corpus`,
  );
  console.log(JSON.stringify(summary, null, 2));
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((err) => {
    console.error('\n✗ Merge failed:', err);
    process.exit(1);
  });
}
