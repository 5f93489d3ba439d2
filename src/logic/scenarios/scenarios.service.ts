import { Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fg from 'fast-glob';
import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'path';
import { EnvironmentVariables } from '../../config/env.validation';
import { PromptInput } from '../harness/types';
import { Scenario, ScenarioSummary, ScenarioView, scenarioSchema } from './types';

@Injectable()
export class ScenariosService implements OnModuleInit {
  private readonly logger = new Logger(ScenariosService.name);
  private readonly scenarios = new Map<string, Scenario>();
  private readonly directory: string;

  constructor(configService: ConfigService<EnvironmentVariables, true>) {
    this.directory = resolve(process.cwd(), configService.get('SCENARIOS_DIR', { infer: true }));
  }

  async onModuleInit() {
    await this.load();
  }

  /**
   * (Re)reads every *.json file in the scenarios directory. Files that fail to parse or
   * validate are skipped with a warning, as is a second file claiming an existing name.
   */
  async load(): Promise<number> {
    this.scenarios.clear();
    const files = await fg('*.json', { cwd: this.directory, absolute: true, onlyFiles: true });

    for (const file of files.sort()) {
      let raw: unknown;
      try {
        raw = JSON.parse(await readFile(file, 'utf8'));
      } catch (error) {
        this.logger.warn(`Skipping ${file}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }

      const parsed = scenarioSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        this.logger.warn(`Skipping ${file}: ${issues}`);
        continue;
      }

      const name = parsed.data.name ?? basename(file, '.json');
      if (this.scenarios.has(name)) {
        this.logger.warn(`Skipping ${file}: scenario "${name}" is already defined`);
        continue;
      }
      this.scenarios.set(name, { ...parsed.data, name, source: file });
    }

    this.logger.log(`Loaded ${this.scenarios.size} scenario(s) from ${this.directory}`);
    return this.scenarios.size;
  }

  list(): ScenarioSummary[] {
    return [...this.scenarios.values()].map(s => ({
      name: s.name,
      description: s.description,
      turnCount: s.turns.length,
    }));
  }

  get(name: string): Scenario {
    const scenario = this.scenarios.get(name);
    if (!scenario) {
      throw new NotFoundException(`Scenario "${name}" not found`);
    }
    return scenario;
  }

  describe(name: string): ScenarioView {
    const { source: _source, ...view } = this.get(name);
    return { ...view, turns: view.turns.map(t => ({ ...t })) };
  }

  toPromptInput(name: string): PromptInput {
    const s = this.get(name);
    return {
      snippet: s.snippet,
      turns: s.turns.map(t => ({ ...t })),
      delimiter: s.delimiter,
      instruction: s.instruction,
      labels: s.labels,
    };
  }
}
