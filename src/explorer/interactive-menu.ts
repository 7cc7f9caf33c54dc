import { join } from 'path';
import { DataRecord, DatasetFileInfo } from '../types';
import { DatasetStore } from '../data/dataset-store';
import { errorMessage, isHarvestError, logger } from '../utils';
import { resolveFieldMapping } from './field-mappings';
import { RecordView, formatFrequency, formatMetadata, topN } from './record-view';

export interface Prompt {
  ask(question: string): Promise<string>;
}

export type Writer = (text: string) => void;

export interface ExplorerIO {
  prompt: Prompt;
  write: Writer;
}

export interface ExplorerOptions {
  exportDir?: string;
  now?: () => Date;
  previewRows?: number;
  pageRows?: number;
}

export type MenuOutcome = 'switch' | 'exit';

export interface MenuItem {
  label: string;
  run: () => Promise<MenuOutcome | void>;
}

const RULE = '='.repeat(80);

function section(title: string): string {
  return `\n${RULE}\n${title}\n${RULE}`;
}

export function exportFileName(datasetName: string, now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `${datasetName}_export_${stamp}.csv`;
}

/**
 * Numbered menu over one dataset. Entries come from the dataset family's
 * field mapping, so every family shares the same loop.
 */
export class InteractiveExplorer {
  private view: RecordView;
  private name: string;
  private io: ExplorerIO;
  private options: Required<ExplorerOptions>;

  constructor(view: RecordView, name: string, io: ExplorerIO, options: ExplorerOptions = {}) {
    this.view = view;
    this.name = name;
    this.io = io;
    this.options = {
      exportDir: options.exportDir ?? process.cwd(),
      now: options.now ?? (() => new Date()),
      previewRows: options.previewRows ?? 10,
      pageRows: options.pageRows ?? 20,
    };
  }

  private get noun(): string {
    return this.view.mapping.noun;
  }

  private showMatches(records: DataRecord[], description: string, maxRows?: number): void {
    this.io.write(`\nFound ${records.length} ${this.noun} ${description}`);
    this.io.write(records.length > 0 ? this.view.render(records, maxRows) : `No ${this.noun} found`);
  }

  buildMenu(): MenuItem[] {
    const { mapping } = this.view;
    const noun = this.noun;

    const items: MenuItem[] = [
      {
        label: `View All ${noun} (first ${this.options.pageRows})`,
        run: async () => {
          this.io.write(section(`FIRST ${this.options.pageRows} ${noun.toUpperCase()}`));
          this.io.write(this.view.render(this.view.records, this.options.pageRows));
        },
      },
      {
        label: `View All ${noun} (complete)`,
        run: async () => {
          this.io.write(section(`ALL ${noun.toUpperCase()}`));
          this.io.write(this.view.render());
        },
      },
    ];

    for (const search of mapping.searches) {
      items.push({
        label: search.label,
        run: async () => {
          const keyword = (await this.io.prompt.ask(`\n${search.prompt}: `)).trim();
          this.showMatches(this.view.search(search.fields, keyword), `matching '${keyword}'`);
        },
      });
    }

    for (const preset of mapping.presets) {
      items.push({
        label: preset.label,
        run: async () => {
          this.showMatches(this.view.filter(preset.field, preset.keyword), `matching '${preset.keyword}'`, this.options.pageRows);
        },
      });
    }

    items.push(
      {
        label: 'Search Any Field',
        run: async () => {
          const field = (await this.io.prompt.ask('\nEnter field name: ')).trim();
          const keyword = (await this.io.prompt.ask('Enter keyword: ')).trim();
          this.showMatches(this.view.filter(field, keyword), `where ${field} contains '${keyword}'`);
        },
      },
      {
        label: 'Field Frequency',
        run: async () => {
          const field = (await this.io.prompt.ask('\nEnter field name: ')).trim();
          this.io.write(`\n${formatFrequency(`Top values of ${field}`, topN(this.view.frequency(field), 15))}`);
        },
      },
      {
        label: 'View Statistics',
        run: async () => {
          this.io.write(section('STATISTICS'));
          this.io.write(this.view.statistics());
        },
      },
      {
        label: 'Export to CSV',
        run: async () => {
          const path = join(this.options.exportDir, exportFileName(this.name, this.options.now()));
          try {
            await this.view.exportCsv(path);
            this.io.write(`\nData exported to: ${path}`);
          } catch (error) {
            if (!isHarvestError(error)) throw error;
            logger.warn('Explorer', 'Export failed', { dataset: this.name, error: error.message });
            this.io.write(`\nError exporting: ${error.message}`);
          }
        },
      },
      {
        label: 'Show Metadata',
        run: async () => {
          this.io.write(section(`${this.name.toUpperCase()} - METADATA`));
          this.io.write(formatMetadata(this.view.dataset));
        },
      },
      { label: 'Switch File', run: async () => 'switch' }
    );

    return items;
  }

  formatMenu(items: MenuItem[]): string {
    return [
      section('MENU'),
      ...items.map((item, index) => `${index + 1}. ${item.label}`),
      '0. Exit',
      '',
    ].join('\n');
  }

  preview(): void {
    this.io.write(section(`${this.name.toUpperCase()} - METADATA`));
    this.io.write(formatMetadata(this.view.dataset));
    this.io.write(section(`PREVIEW (First ${this.options.previewRows} ${this.noun})`));
    this.io.write(this.view.render(this.view.records, this.options.previewRows));
  }

  async run(): Promise<MenuOutcome> {
    const items = this.buildMenu();

    for (;;) {
      this.io.write(this.formatMenu(items));
      const choice = (await this.io.prompt.ask('Enter your choice: ')).trim();

      if (choice === '0') {
        this.io.write('\nGoodbye!');
        return 'exit';
      }

      const index = Number(choice) - 1;
      const item = Number.isInteger(index) ? items[index] : undefined;
      if (!item) {
        this.io.write('\nInvalid choice. Please try again.');
        continue;
      }

      const outcome = await item.run();
      if (outcome) {
        return outcome;
      }
    }
  }
}

export function formatFileChoices(files: DatasetFileInfo[]): string {
  return [
    section('AVAILABLE DATA FILES'),
    ...files.map(
      (info, index) =>
        `${index + 1}. ${info.name.toUpperCase()} - ${info.sizeKb.toFixed(1)} KB (Modified: ${info.modifiedAt.toISOString()})`
    ),
    '0. Exit',
  ].join('\n');
}

export async function selectDataset(store: DatasetStore, io: ExplorerIO): Promise<DatasetFileInfo | null> {
  const files = await store.list();
  if (files.length === 0) {
    io.write(`\nNo data files found in ${store.outputDir}/`);
    io.write('Run the fetch first: npm run fetch');
    return null;
  }

  io.write(formatFileChoices(files));
  const choice = (await io.prompt.ask(`\nSelect file to view (1-${files.length}): `)).trim();
  if (choice === '0') {
    return null;
  }

  const index = Number(choice) - 1;
  const selected = Number.isInteger(index) ? files[index] : undefined;
  if (!selected) {
    io.write('Invalid choice');
    return null;
  }
  return selected;
}

/**
 * Select, load and explore datasets until the user exits.
 */
export async function exploreStore(store: DatasetStore, io: ExplorerIO, options: ExplorerOptions = {}): Promise<void> {
  for (;;) {
    const selected = await selectDataset(store, io);
    if (!selected) {
      io.write('\nGoodbye!');
      return;
    }

    io.write(`\nLoading data from: ${selected.path}`);
    let view: RecordView;
    try {
      view = new RecordView(await store.load(selected.path), resolveFieldMapping(selected.name));
    } catch (error) {
      io.write(`Error loading data: ${errorMessage(error)}`);
      continue;
    }

    if (view.records.length === 0) {
      io.write('No records found in the file');
      continue;
    }

    const explorer = new InteractiveExplorer(view, selected.name, io, options);
    explorer.preview();
    if ((await explorer.run()) === 'exit') {
      return;
    }
  }
}
