/**
 * Sync Package - View Sync Service
 *
 * Runs the whole pipeline for template roots: generate or update the view
 * artifact, hand it to the host compiler, attach the view type to its root
 * and, in declarative-reference mode, assign the generated references.
 *
 * The host reload is observed once per service. Each reload drains the
 * pending attach queue; declarative assignment then runs for every root whose
 * attach applied or whose artifact was part of the reload.
 */

import path from "node:path";
import {
  DisposableStore,
  errorMessage,
  nullLogger,
  SimpleEmitter,
  ViewBindError,
  ViewBindErrorCode,
  type BindingDescriptor,
  type Event,
  type GenerationSettings,
  type Logger,
  type ViewBindErrorCodeType,
  type ViewBindWarning,
} from "@viewbind/model";
import { classNameFor, collectFields, generateView } from "@viewbind/codegen";
import {
  AssignmentStatsStore,
  DeferredAttacher,
  MemorySessionStore,
  PendingAttachQueue,
  ReferenceAssigner,
  type ArtifactCompiler,
  type AssignmentStats,
  type AttachOutcome,
  type AttachRequest,
  type AttachResult,
  type HostTypeRegistry,
  type ReloadEvent,
  type SessionStore,
  type TemplateStore,
} from "@viewbind/attach";
import type { ArtifactStore } from "./artifacts.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

export interface ViewSyncServiceOptions {
  settings: GenerationSettings;
  templates: TemplateStore;
  artifacts: ArtifactStore;
  registry: HostTypeRegistry;

  /** Receives changed artifacts; omit when the host watches the files itself */
  compiler?: ArtifactCompiler;

  /** Backing store of the pending attach queue; defaults to memory */
  session?: SessionStore;

  logger?: Logger;

  /** Keep attach requests that stay unresolved after a reload */
  requeueUnresolved?: boolean;
}

export type RootReport = GeneratedRootReport | FailedRootReport;

export interface GeneratedRootReport {
  status: "generated";
  rootIdentity: string;
  className: string;

  /** Type name the attach was requested for (namespace-qualified) */
  typeName: string;
  artifactPath: string;
  artifactChanged: boolean;
  created: boolean;
  attach: AttachOutcome;

  /** Present when references were assigned during this call */
  stats?: AssignmentStats;
  warnings: ViewBindWarning[];
}

export interface FailedRootReport {
  status: "failed";
  rootIdentity: string;
  message: string;
  code?: ViewBindErrorCodeType;
}

export interface RootAssignment {
  rootIdentity: string;
  typeName: string;
  stats: AssignmentStats;
}

export interface ReloadReport {
  paths: readonly string[];
  attach: AttachResult[];
  assigned: RootAssignment[];
}

/* =============================================================================
 * SERVICE
 * ============================================================================= */

export class ViewSyncService {
  readonly #settings: GenerationSettings;
  readonly #templates: TemplateStore;
  readonly #artifacts: ArtifactStore;
  readonly #compiler: ArtifactCompiler | undefined;
  readonly #logger: Logger;
  readonly #queue: PendingAttachQueue;
  readonly #stats = new AssignmentStatsStore();
  readonly #attacher: DeferredAttacher;
  readonly #assigner: ReferenceAssigner;
  readonly #disposables = new DisposableStore();
  readonly #reloadProcessed: SimpleEmitter<ReloadReport>;

  /** Artifacts generated by this service, by path */
  readonly #generated = new Map<string, AttachRequest>();

  /** Fires after a host reload has been processed */
  readonly onDidProcessReload: Event<ReloadReport>;

  constructor(options: ViewSyncServiceOptions) {
    this.#settings = options.settings;
    this.#templates = options.templates;
    this.#artifacts = options.artifacts;
    this.#compiler = options.compiler;
    this.#logger = options.logger ?? nullLogger;
    this.#queue = new PendingAttachQueue(options.session ?? new MemorySessionStore());
    this.#attacher = new DeferredAttacher(options.registry, this.#templates, this.#queue, {
      logger: this.#logger,
      requeueUnresolved: options.requeueUnresolved,
    });
    this.#assigner = new ReferenceAssigner(options.registry, this.#templates, this.#stats, {
      nodeType: this.#settings.catalog.nodeType,
      logger: this.#logger,
    });
    this.#reloadProcessed = new SimpleEmitter<ReloadReport>(this.#logger);
    this.onDidProcessReload = this.#reloadProcessed.event;

    this.#disposables.add(options.registry.onDidReload(event => this.#handleReload(event)));
  }

  get settings(): GenerationSettings {
    return this.#settings;
  }

  /** Requests waiting for the next reload */
  get pendingAttach(): readonly AttachRequest[] {
    return this.#queue.list();
  }

  /**
   * Generate one root.
   *
   * @throws ViewBindError TEMPLATE_NOT_FOUND, INVALID_NAME or CLASS_NOT_FOUND
   */
  generate(rootIdentity: string): GeneratedRootReport {
    const settings = this.#settings;
    const root = this.#templates.load(rootIdentity);
    if (!root) {
      throw new ViewBindError(`Template "${rootIdentity}" not found`, ViewBindErrorCode.TEMPLATE_NOT_FOUND, rootIdentity);
    }

    const className = classNameFor(root, settings, rootIdentity);
    const artifactPath = this.artifactPathFor(className);
    const view = generateView(root, settings, {
      existing: this.#artifacts.read(artifactPath),
      rootIdentity,
      file: artifactPath,
      logger: this.#logger,
    });

    if (view.changed) {
      this.#artifacts.write(artifactPath, view.text);
      this.#compiler?.stage(artifactPath, view.text);
      this.#logger.info(`${view.created ? "created" : "updated"} ${artifactPath} (${view.descriptors.length} field(s))`);
    }

    const typeName = this.typeNameFor(className);
    this.#generated.set(artifactPath, { rootIdentity, typeName, artifactPath });

    const attach = this.#attacher.requestAttach(rootIdentity, typeName, artifactPath);
    const stats =
      settings.bindingMode === "declarative-reference" && attach.outcome === "applied"
        ? this.#assign(rootIdentity, typeName, view.descriptors, artifactPath)
        : undefined;

    return {
      status: "generated",
      rootIdentity,
      className,
      typeName,
      artifactPath,
      artifactChanged: view.changed,
      created: view.created,
      attach: attach.outcome,
      stats,
      warnings: view.warnings,
    };
  }

  /**
   * Generate several roots. A failing root is reported and the rest continue.
   */
  generateMany(rootIdentities: Iterable<string>): RootReport[] {
    const reports: RootReport[] = [];
    for (const rootIdentity of rootIdentities) {
      try {
        reports.push(this.generate(rootIdentity));
      } catch (error) {
        const message = errorMessage(error);
        this.#logger.error(`${rootIdentity}: ${message}`);
        reports.push({
          status: "failed",
          rootIdentity,
          message,
          code: error instanceof ViewBindError ? error.code : undefined,
        });
      }
    }
    return reports;
  }

  generateAll(): RootReport[] {
    return this.generateMany(this.#templates.list());
  }

  /**
   * Final field list of a root, without touching its artifact.
   */
  collectFields(rootIdentity: string): BindingDescriptor[] {
    const root = this.#templates.load(rootIdentity);
    if (!root) {
      throw new ViewBindError(`Template "${rootIdentity}" not found`, ViewBindErrorCode.TEMPLATE_NOT_FOUND, rootIdentity);
    }
    return collectFields(root, this.#settings);
  }

  tryGetStats(rootIdentity: string): AssignmentStats | undefined {
    return this.#stats.tryGetStats(rootIdentity);
  }

  artifactPathFor(className: string): string {
    return path.posix.join(this.#settings.output.outputDir, `${className}.ts`);
  }

  typeNameFor(className: string): string {
    return this.#settings.namespace.length > 0 ? `${this.#settings.namespace}.${className}` : className;
  }

  dispose(): void {
    this.#disposables.dispose();
  }

  /* ---------------------------------------------------------------------------
   * Reload
   * --------------------------------------------------------------------------- */

  #handleReload(event: ReloadEvent): void {
    const attach = this.#attacher.processReload();
    const assigned: RootAssignment[] = [];

    if (this.#settings.bindingMode === "declarative-reference") {
      const targets = new Map<string, AttachRequest>();
      for (const result of attach) {
        if (result.outcome === "applied") targets.set(result.request.rootIdentity, result.request);
      }
      for (const artifactPath of event.paths) {
        const request = this.#generated.get(artifactPath);
        if (request && !targets.has(request.rootIdentity)) targets.set(request.rootIdentity, request);
      }

      for (const request of targets.values()) {
        const stats = this.#assignAfterReload(request);
        if (stats) assigned.push({ rootIdentity: request.rootIdentity, typeName: request.typeName, stats });
      }
    }

    this.#reloadProcessed.emit({ paths: event.paths, attach, assigned });
  }

  #assignAfterReload(request: AttachRequest): AssignmentStats | undefined {
    try {
      const descriptors = this.collectFields(request.rootIdentity);
      return this.#assign(request.rootIdentity, request.typeName, descriptors, request.artifactPath);
    } catch (error) {
      this.#logger.error(`${request.rootIdentity}: reference assignment failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  #assign(
    rootIdentity: string,
    typeName: string,
    descriptors: readonly BindingDescriptor[],
    artifactPath: string
  ): AssignmentStats {
    const stats = this.#assigner.assign(rootIdentity, typeName, descriptors, artifactPath);
    if (stats.total > 0) {
      this.#logger.info(
        `${rootIdentity}: assigned ${stats.success}/${stats.total} reference(s)` +
          ` (missing paths: ${stats.missingPath}, missing capabilities: ${stats.missingCapability})`
      );
    }
    return stats;
  }
}
