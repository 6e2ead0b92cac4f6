/**
 * Builder module - folds records into one merged tree and renders the schema
 */

import type { ColumnarSchema } from "../../types/data-model.js";
import { ConfigError, SchemaStateError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { ReferenceDefaults } from "../reference/types.js";
import { completeElements } from "./complete.js";
import { renderSchema } from "./render.js";
import { SchemaTree } from "./tree.js";
import type { BuilderOptions, SchemaBuildResult } from "./types.js";
import { widen } from "./widen.js";

export * from "./types.js";
export * from "./tree.js";
export * from "./widen.js";
export * from "./complete.js";
export * from "./render.js";

/**
 * Default builder options
 */
const DEFAULT_OPTIONS: Required<BuilderOptions> = {
  fieldOrder: "observed",
};

/**
 * Complete element shapes, widen and render a finished tree
 */
export function finalizeTree(
  tree: SchemaTree,
  referenceDefaults?: ReferenceDefaults,
  options: BuilderOptions = {},
): SchemaBuildResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const referenceFields = referenceDefaults?.fieldsFor(tree.recordKind);

  if (!referenceFields) {
    logger.debug("No reference fields for record kind, skipping widening", {
      recordKind: tree.recordKind,
    });
  }

  const { root: completedRoot, completed } = completeElements(
    tree.type,
    referenceDefaults?.elementsFor(tree.recordKind),
  );
  const { root, added } = widen(completedRoot, referenceFields);
  const schema = renderSchema(tree.recordKind, root, {
    fieldOrder: opts.fieldOrder,
    referenceFields,
  });

  logger.info("Schema build complete", {
    recordKind: tree.recordKind,
    recordsFolded: tree.recordCount,
    fieldsObserved: tree.type.fields.size,
    fieldsWidened: added.length,
    elementsCompleted: completed.length,
  });

  return {
    schema,
    tree: root,
    metadata: {
      recordKind: tree.recordKind,
      recordsFolded: tree.recordCount,
      fieldsObserved: tree.type.fields.size,
      fieldsWidened: added,
      elementsCompleted: completed,
    },
  };
}

/**
 * Build a schema for `recordKind` from a sequence of decoded records
 */
export function buildSchema(
  recordKind: string,
  records: Iterable<unknown>,
  referenceDefaults?: ReferenceDefaults,
  options: BuilderOptions = {},
): ColumnarSchema {
  return new SchemaBuilder(recordKind, referenceDefaults, options)
    .addAll(records)
    .finalize().schema;
}

/**
 * Build a schema from an async stream of decoded records
 */
export async function buildSchemaFromStream(
  recordKind: string,
  records: AsyncIterable<unknown>,
  referenceDefaults?: ReferenceDefaults,
  options: BuilderOptions = {},
): Promise<ColumnarSchema> {
  const builder = new SchemaBuilder(recordKind, referenceDefaults, options);
  await builder.addStream(records);
  return builder.finalize().schema;
}

/**
 * Fold records round-robin into independent partial trees and merge them at
 * the end. Each partial tree could live on its own worker; only the final
 * merge touches more than one of them.
 */
export async function buildSchemaPartitioned(
  recordKind: string,
  records: Iterable<unknown> | AsyncIterable<unknown>,
  partitions: number,
  referenceDefaults?: ReferenceDefaults,
  options: BuilderOptions = {},
): Promise<SchemaBuildResult> {
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new ConfigError(`Partition count must be a positive integer, got ${partitions}`);
  }

  const trees = Array.from({ length: partitions }, () => new SchemaTree(recordKind));
  let index = 0;
  for await (const record of records) {
    trees[index % partitions].mergeRecord(record);
    index++;
  }

  const [combined, ...rest] = trees;
  for (const tree of rest) {
    combined.mergeTree(tree);
  }

  logger.debug("Merged partial schema trees", { recordKind, partitions });
  return finalizeTree(combined, referenceDefaults, options);
}

/**
 * Main builder class
 */
export class SchemaBuilder {
  private readonly tree: SchemaTree;
  private readonly options: Required<BuilderOptions>;
  private result: SchemaBuildResult | undefined;

  constructor(
    recordKind: string,
    private readonly referenceDefaults?: ReferenceDefaults,
    options: BuilderOptions = {},
  ) {
    this.tree = new SchemaTree(recordKind);
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get recordKind(): string {
    return this.tree.recordKind;
  }

  get recordCount(): number {
    return this.tree.recordCount;
  }

  get isFinalized(): boolean {
    return this.result !== undefined;
  }

  add(record: unknown): this {
    this.assertOpen();
    this.tree.mergeRecord(record);
    return this;
  }

  addAll(records: Iterable<unknown>): this {
    for (const record of records) {
      this.add(record);
    }
    return this;
  }

  async addStream(records: AsyncIterable<unknown>): Promise<this> {
    for await (const record of records) {
      this.add(record);
    }
    return this;
  }

  /**
   * Fold another builder's records into this one (partial-tree combine)
   */
  merge(other: SchemaBuilder): this {
    this.assertOpen();
    this.tree.mergeTree(other.tree);
    return this;
  }

  /**
   * Widen and render. Happens once; later calls return the same result.
   */
  finalize(): SchemaBuildResult {
    this.result ??= finalizeTree(this.tree, this.referenceDefaults, this.options);
    return this.result;
  }

  private assertOpen(): void {
    if (this.result) {
      throw new SchemaStateError(
        `Schema builder for ${this.recordKind} is already finalized`,
        { recordKind: this.recordKind },
      );
    }
  }
}
