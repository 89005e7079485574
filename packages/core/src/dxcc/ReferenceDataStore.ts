import { EventEmitter } from 'eventemitter3';
import { ReferenceTableSchema } from '@dxcc/contracts';
import type { DxccConfig, DxccConfigUpdate, QueryBackend, ReferenceTable } from '@dxcc/contracts';
import { CallsignAnalyzer } from '../callsign/callsign-analyzer.js';
import type { AnalyzeResult } from '../callsign/callsign-analyzer.js';
import { isWhitelistAllowed } from '../callsign/whitelist-checker.js';
import { createReferenceQuery } from './createReferenceQuery.js';
import { resolveDxccConfig } from './dxcc-config.js';
import type { IReferenceQuery } from './IReferenceQuery.js';
import { createConsoleLogger } from './logger.js';
import type { DxccLogger } from './logger.js';
import { ReferenceDataError } from './ReferenceDataError.js';
import { validateReferenceTable } from './reference-table-validator.js';
import type { ReferenceTableIssue } from './reference-table-validator.js';

/**
 * 已加载参考表的概况
 */
export interface ReferenceTableSummary {
  date?: Date;
  backend: QueryBackend;
  entities: number;
  prefixes: number;
  exceptions: number;
  invalidOperations: number;
  zoneExceptions: number;
  issues: number;
}

export interface ReferenceDataStoreEvents {
  'tableLoaded': (summary: ReferenceTableSummary) => void;
  'validationIssue': (issue: ReferenceTableIssue) => void;
}

export interface ReferenceDataStoreOptions {
  config?: DxccConfigUpdate;
  env?: NodeJS.ProcessEnv;
  logger?: DxccLogger;
}

interface ActiveTable {
  table: ReferenceTable;
  query: IReferenceQuery;
  analyzer: CallsignAnalyzer;
  summary: ReferenceTableSummary;
}

/**
 * 参考数据仓库
 *
 * 持有当前生效的参考表和查询后端，对外提供 analyze / isAllowed。
 * 新表加载成功后整体替换旧表；旧表不会被修改，已经拿到旧查询对象的调用方不受影响。
 * 加载失败时保留之前的表。
 */
export class ReferenceDataStore extends EventEmitter<ReferenceDataStoreEvents> {
  private readonly config: DxccConfig;
  private readonly logger: DxccLogger;
  private active: ActiveTable | null = null;

  constructor(options: ReferenceDataStoreOptions = {}) {
    super();
    this.config = resolveDxccConfig(options.config, options.env);
    this.logger = options.logger ?? createConsoleLogger('参考数据', this.config.logLevel);
  }

  /**
   * 加载外部解析好的参考表文档
   * @param document 普通对象，时间戳可以是 ISO 字符串、毫秒数或 Date
   */
  load(document: unknown): ReferenceTableSummary {
    this.logger.debug(`开始加载参考表 (后端: ${this.config.backend}, 校验: ${this.config.validation})`);
    const parsed = ReferenceTableSchema.safeParse(document);
    if (!parsed.success) {
      throw ReferenceDataError.invalidDocument(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        parsed.error
      );
    }
    const table = parsed.data;

    const issues = this.config.validation === 'off' ? [] : validateReferenceTable(table);
    for (const issue of issues) {
      this.logger.warn(issue.message);
      this.emit('validationIssue', issue);
    }
    if (issues.length > 0 && this.config.validation === 'strict') {
      throw ReferenceDataError.validationFailed(issues.map((issue) => issue.message));
    }

    const query = createReferenceQuery(table, this.config.backend);
    const summary: ReferenceTableSummary = {
      date: table.date,
      backend: this.config.backend,
      entities: table.entities.length,
      prefixes: table.prefixes.length,
      exceptions: table.exceptions.length,
      invalidOperations: table.invalidOperations.length,
      zoneExceptions: table.zoneExceptions.length,
      issues: issues.length,
    };
    this.active = { table, query, analyzer: new CallsignAnalyzer(query), summary };

    this.logger.info(
      `参考表已加载 (${summary.backend}): ${summary.entities} 个实体, ${summary.prefixes} 个前缀, ` +
        `${summary.exceptions} 个呼号例外, ${summary.invalidOperations} 个无效运营, ${summary.zoneExceptions} 个分区例外`
    );
    this.emit('tableLoaded', summary);
    return summary;
  }

  isLoaded(): boolean {
    return this.active !== null;
  }

  getConfig(): DxccConfig {
    return { ...this.config };
  }

  getSummary(): ReferenceTableSummary | null {
    return this.active ? { ...this.active.summary } : null;
  }

  /**
   * 当前参考表的查询接口
   */
  getQuery(): IReferenceQuery {
    return this.requireActive().query;
  }

  /**
   * 分析呼号，见 CallsignAnalyzer.analyze
   */
  analyze(call: string, timestamp: Date): AnalyzeResult {
    return this.requireActive().analyzer.analyze(call, timestamp);
  }

  /**
   * 白名单检查，见 isWhitelistAllowed
   */
  isAllowed(call: string, adif: number, timestamp: Date): boolean {
    return isWhitelistAllowed(this.requireActive().query, call, adif, timestamp);
  }

  private requireActive(): ActiveTable {
    if (!this.active) {
      throw ReferenceDataError.tableNotLoaded();
    }
    return this.active;
  }
}
