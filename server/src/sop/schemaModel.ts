/**
 * SOP SCHEMA MODEL
 *
 * Declarative description of a valid review payload, loaded once from
 * server/schemas/sop.artwork-review.schema.json and read-only afterwards.
 *
 * Responsibilities:
 * - Parse the schema file and reject keywords the validator cannot classify
 * - Resolve shared sub-shapes referenced through "#/$defs/<name>"
 * - Describe any node path: required fields, element shape, type and bounds,
 *   enumeration, pattern and cross-field rules
 * - Keep the declared property order (renderers walk sections in that order)
 * - Export the schema text unchanged for external tooling
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { SchemaConfigurationError, type PathSegment } from "./errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const SOP_SCHEMA_PATH = path.resolve(__dirname, "../../schemas/sop.artwork-review.schema.json");

export const REQUIRED_VARIANTS_KEYWORD = "x-requiredVariants";

const DEFS_REF_PREFIX = "#/$defs/";
const MAX_REF_DEPTH = 16;

// -----------------------------------------------------------------------------
// NODE SHAPE
// -----------------------------------------------------------------------------

export const schemaNodeTypeEnum = ["object", "array", "string", "number", "integer", "boolean"] as const;
export type SchemaNodeType = typeof schemaNodeTypeEnum[number];

/** At least one item of the array must carry each of `values` in `field`. */
export const RequiredVariantRuleZ = z.object({
  field: z.string().min(1),
  values: z.array(z.string()).min(1),
}).strict();
export type RequiredVariantRule = z.infer<typeof RequiredVariantRuleZ>;

export type SchemaNode = {
  $schema?: string;
  $id?: string;
  $ref?: string;
  $defs?: Record<string, SchemaNode>;
  title?: string;
  description?: string;
  type?: SchemaNodeType;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  additionalProperties?: boolean;
  items?: SchemaNode;
  enum?: string[];
  pattern?: string;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  minItems?: number;
  uniqueItems?: boolean;
  [REQUIRED_VARIANTS_KEYWORD]?: RequiredVariantRule;
};

// Strict: a keyword outside this list is a schema authoring error, caught at load time.
const SchemaNodeZ: z.ZodType<SchemaNode> = z.lazy(() =>
  z.object({
    $schema: z.string().optional(),
    $id: z.string().optional(),
    $ref: z.string().optional(),
    $defs: z.record(z.string(), SchemaNodeZ).optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    type: z.enum(schemaNodeTypeEnum).optional(),
    properties: z.record(z.string(), SchemaNodeZ).optional(),
    required: z.array(z.string()).optional(),
    additionalProperties: z.boolean().optional(),
    items: SchemaNodeZ.optional(),
    enum: z.array(z.string()).min(1).optional(),
    pattern: z.string().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    minLength: z.number().int().min(0).optional(),
    minItems: z.number().int().min(0).optional(),
    uniqueItems: z.boolean().optional(),
    [REQUIRED_VARIANTS_KEYWORD]: RequiredVariantRuleZ.optional(),
  }).strict()
);

export interface SchemaNodeDescriptor {
  type?: SchemaNodeType;
  title?: string;
  /** Declared property names, in file order. */
  properties: string[];
  required: string[];
  closed: boolean;
  items?: SchemaNode;
  enum?: readonly string[];
  pattern?: string;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  minItems?: number;
  uniqueItems: boolean;
  requiredVariants?: RequiredVariantRule;
}

// -----------------------------------------------------------------------------
// MODEL
// -----------------------------------------------------------------------------

export class SchemaModel {
  private constructor(
    readonly root: SchemaNode,
    private readonly sourceText: string,
  ) {}

  static fromText(text: string): SchemaModel {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new SchemaConfigurationError(`Schema is not valid JSON: ${reason}`);
    }

    const parsed = SchemaNodeZ.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.errors.map(err => `[${err.path.join(".") || "root"}] ${err.message}`);
      throw new SchemaConfigurationError(`Schema definition rejected:\n${issues.join("\n")}`);
    }

    const model = new SchemaModel(parsed.data, text);
    model.assertReferencesResolve(model.root, []);
    return model;
  }

  static load(filePath: string = SOP_SCHEMA_PATH): SchemaModel {
    return SchemaModel.fromText(fs.readFileSync(filePath, "utf-8"));
  }

  get title(): string {
    return this.root.title ?? "";
  }

  /** Follows `$ref` chains into `$defs`. */
  resolve(node: SchemaNode): SchemaNode {
    let current = node;
    for (let depth = 0; current.$ref !== undefined; depth++) {
      if (depth >= MAX_REF_DEPTH) {
        throw new SchemaConfigurationError(`Reference chain too deep at ${current.$ref}`);
      }
      current = this.definition(this.definitionName(current.$ref));
    }
    return current;
  }

  definition(name: string): SchemaNode {
    const defs = this.root.$defs ?? {};
    if (!Object.hasOwn(defs, name)) {
      throw new SchemaConfigurationError(`Unknown schema definition: ${name}`);
    }
    return defs[name];
  }

  enumValues(definitionName: string): string[] {
    return [...(this.resolve(this.definition(definitionName)).enum ?? [])];
  }

  nodeAt(nodePath: readonly PathSegment[]): SchemaNode | undefined {
    let node: SchemaNode | undefined = this.root;
    for (const segment of nodePath) {
      if (!node) return undefined;
      const current = this.resolve(node);
      if (typeof segment === "number") {
        node = current.items;
      } else {
        const properties = current.properties ?? {};
        node = Object.hasOwn(properties, segment) ? properties[segment] : undefined;
      }
    }
    return node ? this.resolve(node) : undefined;
  }

  describe(nodePath: readonly PathSegment[]): SchemaNodeDescriptor | undefined {
    const node = this.nodeAt(nodePath);
    if (!node) return undefined;
    return {
      type: node.type,
      title: node.title,
      properties: Object.keys(node.properties ?? {}),
      required: [...(node.required ?? [])],
      closed: node.additionalProperties === false,
      items: node.items ? this.resolve(node.items) : undefined,
      enum: node.enum,
      pattern: node.pattern,
      minimum: node.minimum,
      maximum: node.maximum,
      minLength: node.minLength,
      minItems: node.minItems,
      uniqueItems: node.uniqueItems === true,
      requiredVariants: node[REQUIRED_VARIANTS_KEYWORD],
    };
  }

  propertyOrder(nodePath: readonly PathSegment[]): string[] {
    return this.describe(nodePath)?.properties ?? [];
  }

  /** The declarative schema exactly as authored, with a single trailing newline. */
  exportText(): string {
    return this.sourceText.trim() + "\n";
  }

  private definitionName(ref: string): string {
    if (!ref.startsWith(DEFS_REF_PREFIX)) {
      throw new SchemaConfigurationError(`Unsupported reference: ${ref}`);
    }
    return ref.slice(DEFS_REF_PREFIX.length);
  }

  private assertReferencesResolve(node: SchemaNode, at: string[]): void {
    if (node.$ref !== undefined) {
      try {
        this.resolve(node);
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new SchemaConfigurationError(`${reason} (at ${at.join("/") || "<root>"})`);
      }
    }
    for (const [name, child] of Object.entries(node.properties ?? {})) {
      this.assertReferencesResolve(child, [...at, "properties", name]);
    }
    for (const [name, child] of Object.entries(node.$defs ?? {})) {
      this.assertReferencesResolve(child, [...at, "$defs", name]);
    }
    if (node.items) {
      this.assertReferencesResolve(node.items, [...at, "items"]);
    }
  }
}

export const sopSchema = SchemaModel.load();
