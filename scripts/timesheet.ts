import { readFile } from 'node:fs/promises';
import { argv, exit } from 'node:process';
import { CLI_USAGE, parseCliArgs, renderCliOutput } from '../lib/timesheet/cli';
import { processTranscript } from '../lib/timesheet/process';

async function main(): Promise<void> {
  const parsed = parseCliArgs(argv.slice(2));
  if (!parsed.ok) {
    console.error(`[timesheet] ${parsed.hint}`);
    console.error(CLI_USAGE);
    exit(1);
    return;
  }

  const { file, table, policy, today } = parsed.options;
  try {
    const text = await readFile(file, 'utf8');
    const result = processTranscript(text, { lastWeekPolicy: policy, today });
    const output = renderCliOutput(result, table);
    if (!result.ok) {
      console.error(output);
      exit(1);
    }
    console.log(output);
    exit(0);
  } catch (error) {
    console.error('[timesheet] fatal error', error);
    exit(1);
  }
}

void main();
