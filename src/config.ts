// Configuration loader: JSON with comments, validated with zod, compiled
// into the runtime rule list
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';
import type { ZodError } from 'zod';
import {
  namedGroups,
  templatePlaceholders,
  translatePatternSyntax,
} from './core/pattern-matcher.js';
import { AutoprintError } from './errors.js';
import { DEFAULT_LOG_FILE } from './logger.js';
import {
  type AutoprintConfig,
  type AutoprintConfigInput,
  AutoprintConfigSchema,
  DEFAULT_TIMING,
  type PatternRuleInput,
  type PrintMode,
  type Rule,
} from './types.js';
import { resolveConfigPath } from './utils/filesystem.js';

export const DEFAULT_CONFIG_FILE = 'autoprint.config.json';
export const DEFAULT_WATCH_DIRECTORY = '~/Downloads';

export class ConfigurationError extends AutoprintError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class ConfigMissingError extends AutoprintError {
  constructor(public readonly configPath: string) {
    super('CONFIG_MISSING', `Configuration file not found: ${configPath}`);
  }
}

export class ConfigLoader {
  private readonly configPath: string;
  private readonly baseDir: string;

  constructor(
    configPath: string,
    private readonly home: string = homedir()
  ) {
    this.configPath = resolve(configPath);
    this.baseDir = dirname(this.configPath);
  }

  public loadConfig(): AutoprintConfig {
    if (!existsSync(this.configPath)) {
      throw new ConfigMissingError(this.configPath);
    }

    const rawConfig = this.readConfigFile();
    const validated = this.validateConfig(rawConfig);
    return this.normalizeConfig(validated);
  }

  private readConfigFile(): unknown {
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      return JSON.parse(stripJSONComments(content));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in configuration file: ${error.message}`);
      }
      throw error;
    }
  }

  private validateConfig(config: unknown): AutoprintConfigInput {
    const result = AutoprintConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigurationError(
        `Configuration validation failed:\n${formatZodIssues(result.error).join('\n')}`
      );
    }
    return result.data;
  }

  private normalizeConfig(config: AutoprintConfigInput): AutoprintConfig {
    return {
      watchDirectory: this.resolvePath(config.watchDirectory ?? DEFAULT_WATCH_DIRECTORY),
      defaultPrinter: config.defaultPrinter ?? undefined,
      dedupeTtlSeconds: config.dedupeTtlSeconds,
      language: config.language,
      rules: config.patterns.map((pattern, index) => this.compileRule(pattern, index)),
      logging: {
        file: config.logging.file ? this.resolvePath(config.logging.file) : DEFAULT_LOG_FILE,
        level: config.logging.level,
      },
      notifications: { enabled: config.notifications.enabled },
      timing: { ...DEFAULT_TIMING, ...config.timing },
    };
  }

  private compileRule(input: PatternRuleInput, index: number): Rule {
    const source = translatePatternSyntax(input.pattern);

    let regex: RegExp;
    try {
      regex = new RegExp(source);
    } catch (error) {
      throw new ConfigurationError(
        `patterns.${index}.pattern: invalid regular expression ${JSON.stringify(input.pattern)} (${error instanceof Error ? error.message : String(error)})`
      );
    }

    const groups = new Set(namedGroups(source));
    const unknown = templatePlaceholders(input.destination).filter((name) => !groups.has(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `patterns.${index}.destination: placeholder(s) ${unknown.map((name) => `{${name}}`).join(', ')} not captured by ${input.pattern}`
      );
    }

    return {
      pattern: input.pattern,
      regex,
      destination: this.resolvePath(input.destination),
      printMode: toPrintMode(input.print),
      printer: input.printer ?? undefined,
    };
  }

  private resolvePath(input: string): string {
    return resolveConfigPath(input, this.baseDir, this.home);
  }
}

export function loadConfig(configPath: string): AutoprintConfig {
  return new ConfigLoader(configPath).loadConfig();
}

export function toPrintMode(print: boolean | 'prompt'): PrintMode {
  if (print === 'prompt') return 'prompt';
  return print ? 'always' : 'never';
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `  - ${path}: ${issue.message}`;
  });
}

export function stripJSONComments(content: string): string {
  let result = '';
  let inString = false;
  let inSingleLineComment = false;
  let inMultiLineComment = false;
  let escaped = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inSingleLineComment) {
      if (char === '\n') {
        inSingleLineComment = false;
        result += char;
      }
      continue;
    }

    if (inMultiLineComment) {
      if (char === '*' && nextChar === '/') {
        inMultiLineComment = false;
        i++;
      }
      continue;
    }

    if (inString) {
      result += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      result += char;
    } else if (char === '/' && nextChar === '/') {
      inSingleLineComment = true;
      i++;
    } else if (char === '/' && nextChar === '*') {
      inMultiLineComment = true;
      i++;
    } else {
      result += char;
    }
  }

  return result;
}
