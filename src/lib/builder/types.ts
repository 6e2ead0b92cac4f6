/**
 * Builder module types
 */

import type {
  ColumnarSchema,
  FieldOrder,
  StructType,
} from "../../types/data-model.js";

export interface BuilderOptions {
  fieldOrder?: FieldOrder;
}

export interface RenderOptions {
  fieldOrder: FieldOrder;
  /** Root-level order used by the "reference" field order */
  referenceFields?: readonly string[];
}

export interface SchemaBuildResult {
  schema: ColumnarSchema;
  /** Merged tree after completion and widening, before rendering */
  tree: StructType;
  metadata: {
    recordKind: string;
    recordsFolded: number;
    fieldsObserved: number;
    fieldsWidened: string[];
    /** Dotted paths filled out to their full element shape */
    elementsCompleted: string[];
  };
}
