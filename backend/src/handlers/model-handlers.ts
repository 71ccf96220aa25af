/**
 * Model Handlers
 *
 * Note types. updateModel runs the field reconciler so that surviving
 * fields keep their note values; templates are reconciled by name the same
 * way.
 */

import { z } from "zod";
import { ModelTemplateSchema } from "@deckbridge/shared";
import { assertValidNameList, describeScript } from "../note-types/field-reconciler";
import { createLogger } from "../logger";
import { defineAction, type RegisteredAction } from "./types";

const log = createLogger("ModelHandlers");

const ModelNameSchema = z.string().min(1, "modelName is required");

export interface ModelInfo {
  id: number;
  name: string;
  fields: string[];
  templates: Array<{ name: string; qfmt: string; afmt: string }>;
  css: string;
  noteCount: number;
}

export const modelActions: RegisteredAction[] = [
  defineAction({
    name: "modelNames",
    params: z.object({}).passthrough(),
    handler: (_params, ctx) => ctx.collection().models.allNames(),
  }),

  defineAction({
    name: "modelNamesAndIds",
    params: z.object({}).passthrough(),
    handler: (_params, ctx) => {
      const result: Record<string, number> = {};
      for (const model of ctx.collection().models.all()) {
        result[model.name] = model.id;
      }
      return result;
    },
  }),

  defineAction({
    name: "modelFieldNames",
    params: z.object({ modelName: ModelNameSchema }),
    handler: ({ modelName }, ctx) => {
      const models = ctx.collection().models;
      return models.fieldNames(models.requireByName(modelName));
    },
  }),

  defineAction({
    name: "modelFieldsOnTemplates",
    params: z.object({ modelName: ModelNameSchema }),
    handler: ({ modelName }, ctx) => {
      const models = ctx.collection().models;
      return models.fieldsOnTemplates(models.requireByName(modelName));
    },
  }),

  defineAction({
    name: "createModel",
    params: z.object({
      modelName: ModelNameSchema,
      fields: z.array(z.string()),
      templates: z.array(ModelTemplateSchema).min(1, "At least one template is required"),
      css: z.string().default(""),
    }),
    mutates: true,
    handler: ({ modelName, fields, templates, css }, ctx) =>
      ctx.collection().models.create(modelName, fields, templates, css).id,
  }),

  /**
   * Applies every requested change, or none: all input is validated before
   * the model is touched.
   */
  defineAction({
    name: "updateModel",
    params: z.object({
      modelId: z.number().int(),
      modelName: z.string().optional(),
      fields: z.array(z.string()).optional(),
      templates: z.array(ModelTemplateSchema).optional(),
      css: z.string().optional(),
    }),
    mutates: true,
    handler: ({ modelId, modelName, fields, templates, css }, ctx) => {
      const models = ctx.collection().models;
      const model = models.require(modelId);

      if (modelName !== undefined) {
        models.assertCanRename(model, modelName);
      }
      if (fields !== undefined) {
        assertValidNameList(fields, "field");
      }
      if (templates !== undefined) {
        assertValidNameList(
          templates.map((template) => template.name),
          "template"
        );
      }

      if (modelName !== undefined && modelName !== model.name) {
        models.rename(model, modelName);
      }
      if (fields !== undefined) {
        const script = models.updateFields(model, fields);
        log.info(`Fields of '${model.name}': ${describeScript(script)}`);
      }
      if (templates !== undefined) {
        const script = models.updateTemplates(model, templates);
        log.info(`Templates of '${model.name}': ${describeScript(script)}`);
      }
      if (css !== undefined) {
        models.setCss(model, css);
      }
      return true;
    },
  }),

  defineAction({
    name: "deleteModel",
    params: z.object({ modelId: z.number().int() }),
    mutates: true,
    handler: ({ modelId }, ctx) => {
      const models = ctx.collection().models;
      models.remove(models.require(modelId));
      return true;
    },
  }),

  defineAction({
    name: "getModelInfo",
    params: z.object({ modelId: z.number().int() }),
    handler: ({ modelId }, ctx): ModelInfo | null => {
      const models = ctx.collection().models;
      const model = models.get(modelId);
      if (!model) {
        return null;
      }
      return {
        id: model.id,
        name: model.name,
        fields: models.fieldNames(model),
        templates: model.templates.map(({ name, qfmt, afmt }) => ({ name, qfmt, afmt })),
        css: model.css,
        noteCount: models.useCount(model),
      };
    },
  }),
];
