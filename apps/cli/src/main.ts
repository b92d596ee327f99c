import { createInterface } from 'node:readline';
import {
  createLanguageDetector,
  createSampleCorpus,
  loadDataset,
  loadEngineConfig,
  type Dataset,
} from '@glossa/core';
import { QUIT_COMMANDS, answer, trainingSummary } from './session';

async function readDataset(datasetPath: string | undefined): Promise<Dataset> {
  if (!datasetPath) {
    console.log('[glossa.cli] no dataset given, training on the built-in sample corpus');
    return { records: createSampleCorpus(), skipped: 0 };
  }
  const dataset = await loadDataset(datasetPath);
  if (dataset.records.length === 0) {
    console.warn('[glossa.cli] dataset is empty or missing', { datasetPath });
  }
  if (dataset.skipped > 0) {
    console.warn('[glossa.cli] rows with unknown labels skipped', { skipped: dataset.skipped });
  }
  return dataset;
}

async function main(argv: string[]): Promise<void> {
  const config = loadEngineConfig();
  const detector = createLanguageDetector(config);
  const dataset = await readDataset(argv[0]);

  const report = detector.ingestUnlabeledBatch(dataset.records);
  trainingSummary(detector, report).forEach((line) => console.log(line));

  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  prompt.setPrompt('Ready: ');
  prompt.prompt();
  for await (const line of prompt) {
    const sample = line.trim();
    if (QUIT_COMMANDS.has(sample)) break;
    if (sample) {
      answer(detector, sample).forEach((entry) => console.log(entry));
    }
    prompt.prompt();
  }
  prompt.close();
}

main(process.argv.slice(2)).catch((err) => {
  console.error('[glossa.cli] failed', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
