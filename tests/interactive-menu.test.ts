import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InteractiveExplorer, exploreStore, exportFileName, Prompt } from '../src/explorer/interactive-menu';
import { RecordView } from '../src/explorer/record-view';
import { resolveFieldMapping } from '../src/explorer/field-mappings';
import { DatasetStore } from '../src/data/dataset-store';
import { parseRecord } from '../src/data/cell-normalizer';
import { Dataset, DataRecord } from '../src/types';

class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${question}`);
    }
    return answer;
  }
}

function dataset(records: DataRecord[]): Dataset {
  return {
    metadata: {
      sourceEndpoint: '/event-calendar',
      requestParams: {},
      scrapeTimestamp: '2025-03-01T09:59:00Z',
      totalRecords: records.length,
      totalPagesScraped: 1,
    },
    records,
  };
}

const events = [
  parseRecord({ SYMBOL: 'INFY', COMPANY: 'Infosys', PURPOSE: 'Dividend', DATE: '12-Dec-2025' }),
  parseRecord({ SYMBOL: 'TCS', COMPANY: 'TCS Ltd', PURPOSE: 'Results', DATE: '15-Dec-2025' }),
];

describe('InteractiveExplorer', () => {
  let dir: string;
  let output: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'harvest-menu-'));
    output = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createExplorer(name: string, records: DataRecord[], answers: string[]) {
    const prompt = new ScriptedPrompt(answers);
    const view = new RecordView(dataset(records), resolveFieldMapping(name));
    const explorer = new InteractiveExplorer(
      view,
      name,
      { prompt, write: (text) => output.push(text) },
      { exportDir: dir, now: () => new Date('2025-03-01T10:20:30.000Z') }
    );
    return { explorer, prompt };
  }

  it('should build the menu from the dataset family', () => {
    const { explorer } = createExplorer('event_calendar', events, []);

    const lines = explorer.formatMenu(explorer.buildMenu()).split('\n').slice(4);

    expect(lines).toEqual([
      '1. View All events (first 20)',
      '2. View All events (complete)',
      '3. Search by Purpose',
      '4. Search by Company',
      '5. Search by Date',
      '6. Search Any Field',
      '7. Field Frequency',
      '8. View Statistics',
      '9. Export to CSV',
      '10. Show Metadata',
      '11. Switch File',
      '0. Exit',
      '',
    ]);
  });

  it('should include preset filters for announcements', () => {
    const { explorer } = createExplorer('announcements_equity', [], []);

    const labels = explorer.buildMenu().map((item) => item.label);

    expect(labels.slice(5, 8)).toEqual(['Filter by Financial Results', 'Filter by Dividend', 'Search Any Field']);
  });

  it('should search, reject invalid choices and exit', async () => {
    const { explorer, prompt } = createExplorer('event_calendar', events, ['3', 'dividend', '99', '0']);

    const outcome = await explorer.run();

    expect(outcome).toBe('exit');
    expect(prompt.questions[1]).toBe('\nEnter purpose keyword (e.g. dividend, results): ');
    expect(output).toContain("\nFound 1 events matching 'dividend'");
    expect(output).toContain('\nInvalid choice. Please try again.');
    expect(output[output.length - 1]).toBe('\nGoodbye!');
  });

  it('should show value frequencies for any field', async () => {
    const { explorer } = createExplorer('event_calendar', events, ['7', 'PURPOSE', '0']);

    await explorer.run();

    expect(output).toContain('\nTop values of PURPOSE:\n  Dividend: 1\n  Results: 1');
  });

  it('should report when nothing matches', async () => {
    const { explorer } = createExplorer('event_calendar', events, ['6', 'SYMBOL', 'wipro', '0']);

    await explorer.run();

    expect(output).toContain("\nFound 0 events where SYMBOL contains 'wipro'");
    expect(output).toContain('No events found');
  });

  it('should export to a timestamped CSV file', async () => {
    const { explorer } = createExplorer('event_calendar', events, ['9', '0']);

    await explorer.run();

    const path = join(dir, 'event_calendar_export_20250301_102030.csv');
    expect(output).toContain(`\nData exported to: ${path}`);
    expect(await readFile(path, 'utf-8')).toBe(
      '\uFEFFSYMBOL,COMPANY,PURPOSE,DATE\nINFY,Infosys,Dividend,12-Dec-2025\nTCS,TCS Ltd,Results,15-Dec-2025\n'
    );
  });

  it('should report an export of an empty dataset', async () => {
    const { explorer } = createExplorer('crd', [], ['9', '0']);

    await explorer.run();

    expect(output).toContain('\nError exporting: No records to export');
  });

  it('should hand control back when switching files', async () => {
    const { explorer } = createExplorer('crd', events, ['11']);

    await expect(explorer.run()).resolves.toBe('switch');
  });
});

describe('exportFileName', () => {
  it('should stamp the file name with the UTC time', () => {
    expect(exportFileName('crd', new Date('2025-12-31T23:59:58.123Z'))).toBe('crd_export_20251231_235958.csv');
  });
});

describe('exploreStore', () => {
  let dir: string;
  let output: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'harvest-explore-'));
    output = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should tell the user to fetch first when there is nothing to explore', async () => {
    const store = new DatasetStore(join(dir, 'empty'));

    await exploreStore(store, { prompt: new ScriptedPrompt([]), write: (text) => output.push(text) });

    expect(output).toEqual([
      `\nNo data files found in ${join(dir, 'empty')}/`,
      'Run the fetch first: npm run fetch',
      '\nGoodbye!',
    ]);
  });

  it('should load the selected file and open its menu', async () => {
    const store = new DatasetStore(dir);
    await store.save(dataset(events), 'event_calendar');
    const prompt = new ScriptedPrompt(['1', '0']);

    await exploreStore(store, { prompt, write: (text) => output.push(text) });

    expect(prompt.questions[0]).toBe('\nSelect file to view (1-1): ');
    expect(output).toContain(`\nLoading data from: ${join(dir, 'event_calendar_all.json')}`);
    expect(output).toContain('Scraped: 2025-03-01T09:59:00Z\nMarket Type: N/A\nTotal Records: 2\nPages Fetched: 1\nSource: /event-calendar');
    expect(output[output.length - 1]).toBe('\nGoodbye!');
  });

  it('should stop on an invalid selection', async () => {
    const store = new DatasetStore(dir);
    await store.save(dataset(events), 'event_calendar');

    await exploreStore(store, { prompt: new ScriptedPrompt(['7']), write: (text) => output.push(text) });

    expect(output.slice(-2)).toEqual(['Invalid choice', '\nGoodbye!']);
  });
});
