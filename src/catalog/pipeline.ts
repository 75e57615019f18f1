/**
 * Two-phase build of the catalog: every table is declared first, then every
 * table is populated in a fixed order. Tables that describe the catalog
 * itself (TABLES, COLUMNS, the constraint tables) can only see the list of
 * introspection tables once the declare phase has closed.
 */

import { invariant } from '../errors.js';
import type { SchemaSnapshot } from '../schema/types.js';
import type { DialectAdapter } from './dialect.js';
import type { IntrospectionTableName } from './names.js';
import type { ColumnRegistry } from './registry.js';
import { deriveConstraints, type DerivedConstraint } from './synthesizers/constraints.js';
import type { InformationSchemaTable } from './table.js';
import type { Row } from './values.js';

export enum BuildPhase {
  Declare = 'DECLARE',
  Populate = 'POPULATE',
  Sealed = 'SEALED',
}

export interface DeclareContext {
  readonly adapter: DialectAdapter;
  readonly registry: ColumnRegistry;
}

export interface SynthesisContext extends DeclareContext {
  readonly schema: SchemaSnapshot;
  /** The table being populated. */
  readonly table: InformationSchemaTable;
  /** Every introspection table, in declaration order. Self-descriptive stages only. */
  introspectionTables(): readonly InformationSchemaTable[];
  /** Constraints of user and introspection tables, derived once per build. Self-descriptive stages only. */
  constraints(): readonly DerivedConstraint[];
}

export interface TableDeclaration {
  readonly name: IntrospectionTableName;
  declare(ctx: DeclareContext): InformationSchemaTable;
}

export interface TablePopulator {
  readonly name: IntrospectionTableName;
  /** Whether the rows depend on the full list of introspection tables. */
  readonly selfDescriptive: boolean;
  populate(ctx: SynthesisContext): Row[];
}

export interface BuildReport {
  tables: number;
  rows: number;
}

export class CatalogBuildPipeline {
  private phase = BuildPhase.Declare;
  private readonly declared = new Map<IntrospectionTableName, InformationSchemaTable>();
  private derivedConstraints: readonly DerivedConstraint[] | undefined;

  constructor(
    private readonly schema: SchemaSnapshot,
    private readonly adapter: DialectAdapter,
    private readonly registry: ColumnRegistry,
  ) {}

  get currentPhase(): BuildPhase {
    return this.phase;
  }

  run(declarations: readonly TableDeclaration[], populators: readonly TablePopulator[]): InformationSchemaTable[] {
    invariant(this.phase === BuildPhase.Declare, 'Catalog build pipeline can only run once');

    // Phase 1: shapes only.
    for (const declaration of declarations) {
      this.declare(declaration);
    }

    this.phase = BuildPhase.Populate;
    const populatorNames = new Set(populators.map((p) => p.name));
    invariant(populatorNames.size === populators.length, 'A table has more than one populator');
    for (const name of this.declared.keys()) {
      invariant(populatorNames.has(name), () => `Table ${name} has no populator`);
    }

    // Phase 2: rows, in dependency order.
    for (const populator of populators) {
      const table = this.declared.get(populator.name);
      invariant(table, () => `Populator for undeclared table ${populator.name}`);
      table.setContents(populator.populate(this.contextFor(populator, table)));
    }

    this.phase = BuildPhase.Sealed;
    return [...this.declared.values()];
  }

  report(): BuildReport {
    const tables = [...this.declared.values()];
    return {
      tables: tables.length,
      rows: tables.reduce((sum, t) => sum + (t.populated ? t.rows.length : 0), 0),
    };
  }

  private declare(declaration: TableDeclaration): void {
    invariant(this.phase === BuildPhase.Declare, () => `Table ${declaration.name} declared after the declare phase`);
    invariant(!this.declared.has(declaration.name), () => `Table ${declaration.name} declared twice`);
    const table = declaration.declare({ adapter: this.adapter, registry: this.registry });
    invariant(table.name === this.adapter.nameForDialect(declaration.name), () =>
      `Declaration for ${declaration.name} produced table ${table.name}`);
    this.declared.set(declaration.name, table);
  }

  private contextFor(populator: TablePopulator, table: InformationSchemaTable): SynthesisContext {
    const requireSelfDescriptive = (what: string) => {
      invariant(this.phase === BuildPhase.Populate, () => `${what} requested outside the populate phase`);
      invariant(populator.selfDescriptive, () => `${populator.name} requested ${what} but is not self-descriptive`);
    };
    return {
      schema: this.schema,
      adapter: this.adapter,
      registry: this.registry,
      table,
      introspectionTables: () => {
        requireSelfDescriptive('the introspection table list');
        return [...this.declared.values()];
      },
      constraints: () => {
        requireSelfDescriptive('derived constraints');
        if (!this.derivedConstraints) {
          this.derivedConstraints = deriveConstraints(this.schema, this.adapter, this.registry, [...this.declared.values()]);
        }
        return this.derivedConstraints;
      },
    };
  }
}
