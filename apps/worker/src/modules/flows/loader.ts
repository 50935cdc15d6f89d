/**
 * Flow loader.
 * Resolves flows by name from a directory holding either structured-source
 * modules (exporting `buildFlow()`) or plain JSON definitions, and parses
 * inline JSON definitions.
 */
import { access, readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { AvailableFlow, FlowDefinition } from '@flowqa/shared';
import { FlowCache } from '../../lib/flow-cache.js';
import type { Logger } from '../../lib/logger.js';
import { errorMessage, isRecord } from '../../lib/records.js';
import { ProcessorError } from '../../types/index.js';
import { parseFlowDefinition } from './schemas.js';

/** Structured-source extensions, in lookup order. JSON is tried after all of them. */
export const MODULE_EXTENSIONS = ['ts', 'mts', 'js', 'mjs'] as const;

const FLOW_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export type ModuleImporter = (path: string) => Promise<unknown>;

export interface FlowLoaderOptions {
  flowsDir: string;
  cache?: FlowCache;
  logger?: Logger;
  importModule?: ModuleImporter;
}

const defaultImporter: ModuleImporter = (path) => import(pathToFileURL(path).href);

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class FlowLoader {
  readonly flowsDir: string;
  private readonly cache: FlowCache;
  private readonly logger: Logger | undefined;
  private readonly importModule: ModuleImporter;

  constructor(options: FlowLoaderOptions) {
    this.flowsDir = options.flowsDir;
    this.cache = options.cache ?? new FlowCache();
    this.logger = options.logger;
    this.importModule = options.importModule ?? defaultImporter;
  }

  /**
   * Loads a flow by name: cache, then `<name>.{ts,mts,js,mjs}`, then `<name>.json`.
   * Throws NOT_FOUND listing every discoverable flow when none matches.
   */
  async loadByName(name: string): Promise<FlowDefinition> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    if (FLOW_NAME_PATTERN.test(name)) {
      for (const ext of MODULE_EXTENSIONS) {
        const path = join(this.flowsDir, `${name}.${ext}`);
        if (await fileExists(path)) {
          const flow = await this.loadModuleFlow(path, name);
          this.cache.set(name, flow);
          return flow;
        }
      }

      const jsonPath = join(this.flowsDir, `${name}.json`);
      if (await fileExists(jsonPath)) {
        const flow = await this.loadJsonFlow(jsonPath, name);
        this.cache.set(name, flow);
        return flow;
      }
    }

    throw ProcessorError.notFound(name, this.flowsDir, await this.listAvailable());
  }

  /**
   * Parses an inline JSON flow definition. Not cached.
   */
  loadFromText(text: string): FlowDefinition {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw ProcessorError.invalidDefinition(errorMessage(err));
    }
    return this.validate(raw, 'inline flow');
  }

  /**
   * Lists every flow definition in the directory, both formats.
   * Best-effort: an unreadable directory yields an empty list.
   */
  async listAvailable(): Promise<AvailableFlow[]> {
    let entries: string[];
    try {
      entries = await readdir(this.flowsDir);
    } catch (err) {
      this.logger?.warn({ err, flowsDir: this.flowsDir }, 'Cannot list flow directory');
      return [];
    }

    const known = new Set<string>([...MODULE_EXTENSIONS, 'json']);
    const flows: AvailableFlow[] = [];
    for (const entry of entries) {
      const ext = extname(entry);
      const format = ext.slice(1);
      const name = entry.slice(0, -ext.length);
      if (!known.has(format) || name.length === 0 || name.endsWith('.d') || name === 'index') continue;
      flows.push({ name, format });
    }

    return flows.sort((a, b) => a.name.localeCompare(b.name) || a.format.localeCompare(b.format));
  }

  private async loadModuleFlow(path: string, name: string): Promise<FlowDefinition> {
    this.logger?.info({ flowName: name, path }, 'Loading flow module');

    let mod: unknown;
    try {
      mod = await this.importModule(path);
    } catch (err) {
      throw ProcessorError.malformed(`Cannot load flow module '${name}' from ${path}: ${errorMessage(err)}`);
    }

    const buildFlow = isRecord(mod) ? mod['buildFlow'] : undefined;
    if (typeof buildFlow !== 'function') {
      throw ProcessorError.malformed(`Flow module '${name}' must export a buildFlow() function`, {
        flowName: name,
        path,
      });
    }

    let value: unknown;
    try {
      value = await buildFlow();
    } catch (err) {
      throw ProcessorError.malformed(`buildFlow() of '${name}' failed: ${errorMessage(err)}`, { flowName: name, path });
    }
    return this.validate(value, `buildFlow() of '${name}'`);
  }

  private async loadJsonFlow(path: string, name: string): Promise<FlowDefinition> {
    this.logger?.info({ flowName: name, path }, 'Loading JSON flow');

    const text = await readFile(path, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw ProcessorError.invalidDefinition(`${path}: ${errorMessage(err)}`);
    }
    return this.validate(raw, `flow '${name}'`);
  }

  private validate(raw: unknown, source: string): FlowDefinition {
    const parsed = parseFlowDefinition(raw);
    if (!parsed.success) {
      throw ProcessorError.malformed(
        `${source} is not a valid flow definition: ${parsed.issues.join('; ')}`,
        { issues: parsed.issues },
      );
    }
    return parsed.flow;
  }
}
