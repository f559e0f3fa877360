import type { ConfigMap, ConfigValue, OperatorDefinition, ResolvedConfig } from '../operators/types.js';
import { parseDefinition } from '../operators/parser.js';
import { getEntry, isConfigMap } from '../operators/values.js';
import type { DefinitionStore } from '../store/types.js';
import type { OperatorSchema, ValidationFinding, ValidationReport } from '../schema/types.js';
import { hasErrors, validateDocument, validateReferences, validateResolved } from '../schema/validator.js';
import { buildReport } from '../schema/report.js';
import { CircularDependencyError, NotFoundError, ValidationError, isResolutionError } from '../errors.js';
import type { AuditLog } from '../audit/log.js';
import { chainNames, resolveChain, type DefinitionLoader } from './chain.js';
import { mergeSections } from './merge.js';
import { applyTheme, effectiveTheme } from './theme.js';

export const DEFAULT_ROOT_OPERATOR = 'base';

export interface ResolverOptions {
  store: DefinitionStore;
  schema: OperatorSchema;
  /** Operator every chain may end at without a stored definition. Defaults to `base`. */
  rootName?: string;
  /** Report info-level findings alongside warnings. */
  includeInfo?: boolean;
  audit?: AuditLog;
}

/**
 * Entry point for turning an operator name into its resolved configuration.
 * Every call reads the store afresh and keeps no state between calls.
 */
export class OperatorResolver {
  readonly rootName: string;
  private store: DefinitionStore;
  private schema: OperatorSchema;
  private includeInfo: boolean;
  private audit?: AuditLog;

  constructor(options: ResolverOptions) {
    this.store = options.store;
    this.schema = options.schema;
    this.rootName = options.rootName ?? DEFAULT_ROOT_OPERATOR;
    this.includeInfo = options.includeInfo ?? false;
    this.audit = options.audit;
  }

  /**
   * Resolve an operator, optionally narrowed to one section.
   *
   * @throws NotFoundError, MissingParentError, CircularDependencyError or ValidationError
   */
  resolve(name: string, section?: string): ResolvedConfig {
    try {
      const config = this.resolveOperator(name, section);
      this.audit?.logResolved(name, config.chain, config.theme?.name ?? null, section ?? null);
      return config;
    } catch (err) {
      if (isResolutionError(err)) {
        this.audit?.logResolutionFailed(name, err);
      }
      throw err;
    }
  }

  /**
   * Lint one stored definition on its own: schema rules plus the existence of
   * what it references. Findings are reported, not thrown.
   *
   * @throws NotFoundError when nothing is stored under `name` and it is not the root
   */
  validate(name: string): ValidationReport {
    let document: ConfigValue | undefined;
    try {
      document = this.store.get(name);
    } catch (err) {
      if (err instanceof ValidationError) {
        return this.report(name, [...err.findings]);
      }
      throw err;
    }

    if (document === undefined) {
      if (name !== this.rootName) throw new NotFoundError(name);
      const synthesized: ValidationFinding = {
        field: 'document',
        severity: 'info',
        message: `No stored definition; an empty "${name}" root is used`,
        operator: name,
      };
      return this.report(name, this.includeInfo ? [synthesized] : []);
    }

    const findings = validateDocument(document, this.schema, {
      includeInfo: this.includeInfo,
      expectedName: name,
      operator: name,
    });
    if (isConfigMap(document)) {
      const definition = parseDefinition(name, document);
      findings.push(...validateReferences(definition, this.store, this.rootName));
      findings.push(...this.inheritanceFindings(definition));
    }

    return this.report(name, findings);
  }

  validateAll(): ValidationReport[] {
    return this.store.list().map((name) => this.validate(name));
  }

  private report(name: string, findings: ValidationFinding[]): ValidationReport {
    const report = buildReport(name, findings);
    this.audit?.logValidated(
      name,
      findings.filter((f) => f.severity === 'error').length,
      findings.filter((f) => f.severity === 'warning').length,
    );
    return report;
  }

  /** Walks the extends chain without schema checks and reports a cycle on it. */
  private inheritanceFindings(definition: OperatorDefinition): ValidationFinding[] {
    if (definition.extends === undefined || definition.extends === definition.name) return [];

    const load: DefinitionLoader = (candidate) => {
      if (candidate === definition.name) return definition;
      const document = this.store.get(candidate);
      return isConfigMap(document) ? parseDefinition(candidate, document) : undefined;
    };

    try {
      resolveChain(definition.name, load, { axis: 'extends', rootName: this.rootName });
    } catch (err) {
      if (err instanceof CircularDependencyError) {
        return [
          {
            field: 'extends',
            severity: 'error',
            message: err.message,
            suggestion: 'Remove the "extends" reference that closes the loop',
            operator: definition.name,
            cycle: [...err.cycle],
          },
        ];
      }
      // A broken ancestor further up is reported on its own definition.
      if (!isResolutionError(err)) throw err;
    }
    return [];
  }

  private resolveOperator(name: string, section: string | undefined): ResolvedConfig {
    const findings: ValidationFinding[] = [];
    // Both axes may reach the same definition (usually the root); read it once per call.
    const loaded = new Map<string, OperatorDefinition | undefined>();
    const load: DefinitionLoader = (candidate) => {
      if (!loaded.has(candidate)) {
        loaded.set(candidate, this.loadDefinition(candidate, findings));
      }
      return loaded.get(candidate);
    };

    const chain = resolveChain(name, load, { axis: 'extends', rootName: this.rootName });
    const leaf = chain.definitions[chain.definitions.length - 1];

    // Precedence, lowest first: operators above the one declaring the theme,
    // the theme chain, then the declaring operator down to the leaf.
    const themeRef = effectiveTheme(chain);
    const declaredAt = themeRef?.declaredAt ?? chain.definitions.length;
    let sections = mergeSections(chain.definitions.slice(0, declaredAt));
    let theme: ResolvedConfig['theme'];

    if (themeRef) {
      const themeChain = resolveChain(themeRef.theme, load, {
        axis: 'theme',
        rootName: this.rootName,
        origin: { operator: themeRef.declaredBy, kind: 'theme' },
      });
      sections = applyTheme(sections, themeChain, new Set(chainNames(chain)));
      theme = { name: themeRef.theme, chain: chainNames(themeChain) };
    }

    sections = mergeSections(chain.definitions.slice(declaredAt), sections);

    if (section !== undefined) {
      sections = { [section]: this.scopeTo(sections, section, name, findings) };
    }

    const config: ResolvedConfig = {
      name: leaf.name,
      version: leaf.version,
      description: leaf.description,
      tags: mergeTags(chain.definitions),
      chain: chainNames(chain),
      sections,
      findings: [],
    };
    if (leaf.author !== undefined) config.author = leaf.author;
    if (theme) config.theme = theme;

    const postMerge = validateResolved(config, this.schema, { includeInfo: this.includeInfo });
    if (hasErrors(postMerge)) {
      throw new ValidationError(name, postMerge);
    }

    config.findings = [...findings, ...postMerge];
    return config;
  }

  private scopeTo(
    sections: Record<string, ConfigMap>,
    section: string,
    operator: string,
    findings: ValidationFinding[],
  ): ConfigMap {
    const scoped = getEntry(sections, section);
    if (isConfigMap(scoped)) return scoped;

    findings.push({
      field: section,
      severity: 'warning',
      message: `Section "${section}" is not defined by operator "${operator}" or anything it inherits`,
    });
    return {};
  }

  private loadDefinition(name: string, findings: ValidationFinding[]): OperatorDefinition | undefined {
    const document = this.store.get(name);
    if (document === undefined) return undefined;

    const preMerge = validateDocument(document, this.schema, {
      includeInfo: this.includeInfo,
      expectedName: name,
      operator: name,
    });
    if (hasErrors(preMerge) || !isConfigMap(document)) {
      throw new ValidationError(name, preMerge);
    }

    findings.push(...preMerge);
    return parseDefinition(name, document);
  }
}

function mergeTags(definitions: readonly OperatorDefinition[]): string[] {
  const tags: string[] = [];
  for (const definition of definitions) {
    for (const tag of definition.tags) {
      if (!tags.includes(tag)) tags.push(tag);
    }
  }
  return tags;
}
