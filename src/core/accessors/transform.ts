/**
 * The `accessors` transform: rewrites accesses to the configured fields into
 * getter and setter calls and adds those accessors to each owning aggregate.
 */
import type { CompilationUnit } from '../ast/types.js';
import { buildParentIndex } from '../ast/traverse.js';
import { EditBuffer } from '../edits/edit-buffer.js';
import type { Diagnostic, Transform, TransformContext, TransformResult } from '../transforms/types.js';
import { AccessSiteClassifier } from './classifier.js';
import { collectDeclarations } from './collector.js';
import { parseAccessorsOptions } from './options.js';
import { RewritePlanner } from './planner.js';
import { RewriteSession } from './session.js';
import { applyAggregatePlan, planAggregateRewrites } from './synthesizer.js';
import type { AccessSite, AggregateRewritePlan } from './types.js';

export interface AccessorsConfig {
  /** Qualified names of the fields to encapsulate */
  fields: string[];
  /** Free functions whose bodies are rewritten; `main` when omitted */
  entryPoints?: string[];
}

export interface AccessorsPlan {
  sites: AccessSite[];
  aggregates: AggregateRewritePlan[];
  diagnostics: Diagnostic[];
}

export interface AccessorsRun extends TransformResult {
  sites: AccessSite[];
}

export class AccessorsTransform implements Transform {
  readonly name = 'accessors';

  constructor(private readonly config: AccessorsConfig) {}

  apply(unit: CompilationUnit, context: TransformContext): void {
    const plan = this.plan(unit, context.edits);
    context.logger.debug(`${plan.sites.length} site(s), ${plan.aggregates.length} aggregate(s) in ${unit.path}`);
    for (const diagnostic of plan.diagnostics) {
      context.report(diagnostic);
    }
  }

  /**
   * Classify every access site of the unit and record the edits in `edits`.
   */
  plan(unit: CompilationUnit, edits: EditBuffer = new EditBuffer()): AccessorsPlan {
    const collected = collectDeclarations(unit, this.config.fields, { entryPoints: this.config.entryPoints });
    const session = new RewriteSession(unit, collected.bindings);

    for (const body of collected.bodies) {
      const parents = buildParentIndex(body);
      const planner = new RewritePlanner(unit, edits, parents);
      new AccessSiteClassifier(session, planner, parents).classify(body, edits);
    }

    const aggregates = planAggregateRewrites(unit, session.rewrittenBindings());
    for (const aggregate of aggregates) {
      applyAggregatePlan(aggregate, edits);
    }

    return {
      sites: session.sites,
      aggregates,
      diagnostics: [...collected.diagnostics, ...session.diagnostics],
    };
  }

  /**
   * Rewrite one unit on its own buffer.
   */
  run(unit: CompilationUnit): AccessorsRun {
    const edits = new EditBuffer();
    const plan = this.plan(unit, edits);
    const text = edits.apply(unit.source);
    return {
      path: unit.path,
      text,
      changed: text !== unit.source,
      edits: edits.size,
      diagnostics: plan.diagnostics,
      sites: plan.sites,
    };
  }
}

/**
 * Registry factory: validates configuration options and builds the transform.
 */
export function createAccessorsTransform(options: unknown): AccessorsTransform {
  const parsed = parseAccessorsOptions(options);
  return new AccessorsTransform({ fields: parsed.fields, entryPoints: parsed.entry_points });
}
