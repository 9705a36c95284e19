import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { WizardConfigSchema, type WizardConfig } from './types.js';
import { ConfigError } from './errors.js';

export type ConfigOverrides = {
  answers?: Partial<WizardConfig['answers']>;
  output?: Partial<WizardConfig['output']>;
  ui?: Partial<WizardConfig['ui']>;
};

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private readonly globalDir: string;
  private readonly projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.tmplwiz');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides, env: NodeJS.ProcessEnv = process.env): WizardConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.tmplwiz.yaml'), 'project'));
    raw = this.applyEnvVars(raw, env);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = WizardConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
    }

    return result.data;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${label} config at ${path}`,
        err instanceof Error ? err : undefined,
      );
    }
    // An empty file parses to null
    return isRecord(parsed) ? parsed : {};
  }

  private applyEnvVars(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
    const answers: RawConfig = isRecord(raw.answers) ? { ...raw.answers } : {};
    const output: RawConfig = isRecord(raw.output) ? { ...raw.output } : {};

    if (env.TMPLWIZ_YES) {
      answers.yes = env.TMPLWIZ_YES;
    }
    if (env.TMPLWIZ_NO) {
      answers.no = env.TMPLWIZ_NO;
    }
    if (env.TMPLWIZ_ANSWER_POLICY) {
      answers.policy = env.TMPLWIZ_ANSWER_POLICY;
    }
    if (env.TMPLWIZ_INDENT) {
      // Left as a string when not numeric so validation reports it
      const indent = Number(env.TMPLWIZ_INDENT);
      output.indent = Number.isNaN(indent) ? env.TMPLWIZ_INDENT : indent;
    }

    return { ...raw, answers, output };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const from = source[key];
      const into = target[key];
      if (from === undefined) {
        continue;
      }
      if (isRecord(from) && isRecord(into)) {
        result[key] = this.deepMerge(into, from);
      } else {
        result[key] = from;
      }
    }
    return result;
  }
}
