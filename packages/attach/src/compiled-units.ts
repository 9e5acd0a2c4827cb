/**
 * Attach Package - Compiled Unit Registry
 *
 * In-process stand-in for the host's compile/reload step. Artifacts are staged
 * by path and become resolvable only after `reload()`, which parses them with
 * the TypeScript compiler API.
 */

import ts from "typescript";
import { nullLogger, SimpleEmitter, type DisposableLike, type Event, type Logger } from "@viewbind/model";
import { fieldSlot, type ArtifactCompiler, type HostType, type HostTypeRegistry, type ReferenceSlot, type ReloadEvent } from "./registry.js";

export interface CompiledUnitRegistryOptions {
  /** Short name every behaviour type derives from */
  behaviorBase?: string;

  /** Decorator marking a persisted field */
  persistDecorator?: string;

  logger?: Logger;
}

export class CompiledUnitRegistry implements HostTypeRegistry, ArtifactCompiler, DisposableLike {
  readonly #staged = new Map<string, string>();
  readonly #units = new Map<string, HostType[]>();
  readonly #builtins = new Map<string, HostType>();
  readonly #reloaded: SimpleEmitter<ReloadEvent>;
  readonly #behaviorBase: string;
  readonly #persistDecorator: string;
  readonly #logger: Logger;

  readonly onDidReload: Event<ReloadEvent>;

  constructor(options: CompiledUnitRegistryOptions = {}) {
    this.#logger = options.logger ?? nullLogger;
    this.#behaviorBase = options.behaviorBase ?? "ViewBehaviour";
    this.#persistDecorator = options.persistDecorator ?? "serialized";
    this.#reloaded = new SimpleEmitter<ReloadEvent>(this.#logger);
    this.onDidReload = this.#reloaded.event;
    this.defineType(this.#behaviorBase);
  }

  /**
   * Register a type that exists without a compiled unit.
   */
  defineType(name: string, baseName?: string, slots: readonly string[] = []): HostType {
    const type: HostType = { name, fullName: name, baseName, slots };
    this.#builtins.set(name, type);
    return type;
  }

  /**
   * Queue source for the next reload. Staging again replaces the earlier text.
   */
  stage(path: string, source: string): void {
    this.#staged.set(path, source);
  }

  get hasStaged(): boolean {
    return this.#staged.size > 0;
  }

  /**
   * Compile every staged artifact, replace its unit and notify listeners.
   */
  reload(): ReloadEvent {
    const paths = [...this.#staged.keys()];
    for (const [path, source] of this.#staged) {
      this.#units.set(path, readUnit(path, source, this.#persistDecorator));
    }
    this.#staged.clear();

    const event: ReloadEvent = { paths };
    this.#logger.log(`reloaded ${paths.length} unit(s)`);
    this.#reloaded.emit(event);
    return event;
  }

  /** Types compiled from one artifact */
  typesIn(path: string): readonly HostType[] {
    return this.#units.get(path) ?? [];
  }

  resolveType(typeName: string, artifactPath?: string): HostType | undefined {
    if (artifactPath !== undefined) {
      const local = findType(this.typesIn(artifactPath), typeName);
      if (local) return local;
    }
    for (const types of this.#units.values()) {
      const found = findType(types, typeName);
      if (found) return found;
    }
    return this.#builtins.get(typeName);
  }

  isBehavior(type: HostType): boolean {
    const seen = new Set<string>();
    let current: HostType | undefined = type;
    while (current && !seen.has(current.fullName)) {
      if (current.name === this.#behaviorBase) return true;
      seen.add(current.fullName);
      current = current.baseName === undefined ? undefined : this.resolveType(current.baseName, current.unit);
    }
    return false;
  }

  resolveSlot(type: HostType, fieldName: string): ReferenceSlot | undefined {
    return type.slots.includes(fieldName) ? fieldSlot(fieldName) : undefined;
  }

  dispose(): void {
    this.#staged.clear();
    this.#units.clear();
  }
}

/* =============================================================================
 * UNIT PARSING
 * ============================================================================= */

function findType(types: readonly HostType[], typeName: string): HostType | undefined {
  return types.find(t => t.fullName === typeName) ?? types.find(t => t.name === typeName);
}

/**
 * Collect the classes of one source file, including those in namespaces.
 */
function readUnit(path: string, source: string, persistDecorator: string): HostType[] {
  const sourceFile = ts.createSourceFile(path, source, ts.ScriptTarget.Latest, /* setParentNodes */ true, ts.ScriptKind.TS);
  const types: HostType[] = [];

  const visitStatements = (statements: ts.NodeArray<ts.Statement>, scope: string[]): void => {
    for (const statement of statements) {
      if (ts.isClassDeclaration(statement) && statement.name) {
        const name = statement.name.text;
        types.push({
          name,
          fullName: [...scope, name].join("."),
          baseName: baseNameOf(statement),
          unit: path,
          slots: persistedFields(statement, persistDecorator),
        });
      } else if (ts.isModuleDeclaration(statement) && ts.isIdentifier(statement.name)) {
        visitModule(statement, scope);
      }
    }
  };

  const visitModule = (declaration: ts.ModuleDeclaration, scope: string[]): void => {
    const inner = [...scope, declaration.name.text];
    const body = declaration.body;
    if (!body) return;
    if (ts.isModuleBlock(body)) {
      visitStatements(body.statements, inner);
    } else if (ts.isModuleDeclaration(body)) {
      // namespace A.B { }
      visitModule(body, inner);
    }
  };

  visitStatements(sourceFile.statements, []);
  return types;
}

function baseNameOf(declaration: ts.ClassDeclaration): string | undefined {
  const clause = declaration.heritageClauses?.find(c => c.token === ts.SyntaxKind.ExtendsKeyword);
  const expression = clause?.types[0]?.expression;
  if (!expression) return undefined;
  if (ts.isIdentifier(expression)) return expression.text;
  if (ts.isPropertyAccessExpression(expression)) return expression.name.text;
  return undefined;
}

function persistedFields(declaration: ts.ClassDeclaration, persistDecorator: string): string[] {
  const fields: string[] = [];
  for (const member of declaration.members) {
    if (!ts.isPropertyDeclaration(member) || !ts.isIdentifier(member.name)) continue;
    if (decoratorsOf(member).some(d => decoratorName(d) === persistDecorator)) {
      fields.push(member.name.text);
    }
  }
  return fields;
}

function decoratorsOf(node: ts.Node): readonly ts.Decorator[] {
  return ts.canHaveDecorators(node) ? ts.getDecorators(node) ?? [] : [];
}

/**
 * `@serialized`, `@ui.serialized` and their call forms.
 */
function decoratorName(decorator: ts.Decorator): string | undefined {
  const expression = ts.isCallExpression(decorator.expression) ? decorator.expression.expression : decorator.expression;
  if (ts.isIdentifier(expression)) return expression.text;
  if (ts.isPropertyAccessExpression(expression)) return expression.name.text;
  return undefined;
}
