/**
 * Lint Command
 *
 * Composition root for one upgrade-readiness run: builds the registry,
 * resolves versions, executes checks group by group under a deadline and
 * renders the report.
 */

import * as semver from 'semver';
import { DEFAULT_CONFIG, type FailOn, type LintConfig } from '../config/lint-config';
import { ErrorCode } from '../errors/error-codes';
import { LintError, errorMessage } from '../errors/lint-error';
import { detectVersion } from '../kube/cluster';
import { getAnnotation } from '../kube/objects';
import type { Reader } from '../kube/reader';
import { Namespace } from '../kube/resource-types';
import { LintLogger, createConsoleSubscriber } from '../logging/lint-logger';
import { majorMinorLabel, parseVersion, sameMajorMinor, type Version } from '../version/version';
import { CANONICAL_GROUP_ORDER, type CheckGroup } from './check/constants';
import { Executor, type ExecutionRun } from './check/executor';
import { CheckRegistry } from './check/registry';
import type { CheckExecution, Target } from './check/types';
import { ANNOTATION_REQUESTER } from './check/verbose-formatter';
import { registerBuiltinChecks } from './checks';
import { countFailedExecutions, flattenResults, getVerdict, renderReport, type LintReport, type Verdict } from './output';

export interface LintCommandOptions {
  client: Reader;
  /** Version to upgrade to */
  targetVersion: string;
  /** Detected from the DataScienceCluster when omitted */
  currentVersion?: string;
  config?: LintConfig;
  /** Defaults to a registry holding the built-in checks */
  registry?: CheckRegistry;
  /** When omitted, a logger writing to stderr at config.log_level is used */
  logger?: LintLogger;
  /** External cancellation, combined with the configured timeout */
  signal?: AbortSignal;
  /** Output sink; stdout by default */
  write?: (text: string) => void;
}

export interface LintOutcome {
  report: LintReport;
  verdict: Verdict;
  /** True when the deadline or an external cancel stopped the run early */
  stopped: boolean;
  exitCode: number;
}

/**
 * 1 when the verdict reaches the fail_on threshold, or when a stopped run
 * could not assess every check (unless fail_on is none).
 */
export function exitCodeFor(verdict: Verdict, stopped: boolean, failOn: FailOn): number {
  switch (failOn) {
    case 'none':
      return 0;
    case 'advisory':
      return stopped || verdict !== 'ready' ? 1 : 0;
    case 'blocking':
      return stopped || verdict === 'blocking' ? 1 : 0;
  }
}

export class LintCommand {
  private readonly client: Reader;
  private readonly config: LintConfig;
  private readonly registry: CheckRegistry;
  private readonly logger: LintLogger;
  private readonly executor: Executor;
  private readonly options: LintCommandOptions;

  constructor(options: LintCommandOptions) {
    this.options = options;
    this.client = options.client;
    this.config = options.config ?? DEFAULT_CONFIG;

    if (options.logger) {
      this.logger = options.logger;
    } else {
      this.logger = new LintLogger();
      this.logger.subscribe(createConsoleSubscriber(this.config.log_level));
    }

    if (options.registry) {
      this.registry = options.registry;
    } else {
      this.registry = new CheckRegistry();
      registerBuiltinChecks(this.registry);
    }

    this.executor = new Executor(this.registry, { logger: this.logger });
  }

  async run(): Promise<LintOutcome> {
    const targetVersion = parseVersion(this.options.targetVersion);
    const currentVersion = await this.resolveCurrentVersion();

    let executions: CheckExecution[] = [];
    let stopped = false;

    if (sameMajorMinor(currentVersion, targetVersion)) {
      this.logger.log(
        'info',
        'SELECTION',
        `Current and target versions are both ${majorMinorLabel(targetVersion)}; no upgrade checks to run`
      );
    } else {
      if (semver.lt(targetVersion, currentVersion)) {
        throw new LintError(
          ErrorCode.L104_DOWNGRADE_NOT_SUPPORTED,
          `${targetVersion.version} < ${currentVersion.version}`
        );
      }

      ({ executions, stopped } = await this.executeGroups(
        { client: this.client, currentVersion, targetVersion },
        this.runSignal()
      ));

      const errored = countFailedExecutions(executions);
      if (errored > 0) {
        this.logger.log('warn', 'EXECUTION_ERROR', `${errored} of ${executions.length} checks failed to execute`);
      }
    }

    const report: LintReport = {
      clusterVersion: currentVersion.version,
      targetVersion: targetVersion.version,
      executions,
    };
    const verdict = getVerdict(executions);

    const namespaceRequesters =
      this.config.output === 'table' && this.config.verbose
        ? await this.collectNamespaceRequesters(executions)
        : undefined;

    const write = this.options.write ?? (text => process.stdout.write(text));
    write(renderReport(this.config.output, report, { verbose: this.config.verbose, namespaceRequesters }));

    return { report, verdict, stopped, exitCode: exitCodeFor(verdict, stopped, this.config.fail_on) };
  }

  private async resolveCurrentVersion(): Promise<Version> {
    if (this.options.currentVersion !== undefined) {
      return parseVersion(this.options.currentVersion);
    }
    const detected = await detectVersion(this.client);
    this.logger.log('debug', 'CONFIG', `Detected cluster version ${detected}`);
    return parseVersion(detected);
  }

  private runSignal(): AbortSignal {
    const timeout = AbortSignal.timeout(this.config.timeout_seconds * 1000);
    return this.options.signal ? AbortSignal.any([this.options.signal, timeout]) : timeout;
  }

  /**
   * Groups run in canonical order. The run is stopped only when the signal
   * kept a selected check from being considered; later groups are not started.
   */
  private async executeGroups(target: Target, signal: AbortSignal): Promise<ExecutionRun> {
    const byGroup = new Map<CheckGroup, CheckExecution[]>();
    let stopped = false;
    for (const group of CANONICAL_GROUP_ORDER) {
      const run = await this.executor.runSelective(target, this.config.checks, group, signal);
      byGroup.set(group, run.executions);
      if (run.stopped) {
        stopped = true;
        break;
      }
    }
    return { executions: flattenResults(byGroup), stopped };
  }

  /**
   * Requester annotation of every namespace holding an impacted object.
   * Namespaces that cannot be read are left out.
   */
  private async collectNamespaceRequesters(executions: CheckExecution[]): Promise<Map<string, string>> {
    const namespaces = new Set<string>();
    for (const execution of executions) {
      for (const obj of execution.result.impactedObjects ?? []) {
        if (obj.namespace) {
          namespaces.add(obj.namespace);
        }
      }
    }

    const requesters = new Map<string, string>();
    for (const ns of namespaces) {
      try {
        const requester = getAnnotation(await this.client.get(Namespace, ns), ANNOTATION_REQUESTER);
        if (requester) {
          requesters.set(ns, requester);
        }
      } catch (err) {
        this.logger.log('debug', 'OUTPUT', `Could not read namespace ${ns}: ${errorMessage(err)}`);
      }
    }
    return requesters;
  }
}
