import { STYLE_TAGS } from "./types.js";

const ID_PATTERN = "^[a-z0-9_-]+$";

export const WorldDefinitionSchema = {
  type: "object",
  required: ["id", "title", "start", "rooms", "items"],
  properties: {
    id: { type: "string", minLength: 1, maxLength: 64, pattern: ID_PATTERN },
    title: { type: "string", minLength: 1 },
    description: { type: "string" },
    start: { type: "string", minLength: 1 },
    rooms: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["id", "name", "short_description", "exits"],
        properties: {
          id: { type: "string", pattern: ID_PATTERN },
          name: { type: "string", minLength: 1 },
          short_description: { type: "string", minLength: 1 },
          long_description: { type: "string" },
          exits: {
            type: "object",
            propertyNames: { pattern: "^[a-z][a-z0-9 -]*$" },
            additionalProperties: { type: "string", pattern: ID_PATTERN },
          },
        },
        additionalProperties: false,
      },
    },
    items: {
      type: "array",
      items: {
        type: "object",
        required: ["id", "name", "description", "takeable", "hidden", "location"],
        properties: {
          id: { type: "string", pattern: ID_PATTERN },
          name: { type: "string", minLength: 1 },
          description: { type: "string", minLength: 1 },
          takeable: { type: "boolean" },
          hidden: { type: "boolean" },
          location: { type: "string", minLength: 1 },
        },
        additionalProperties: false,
      },
    },
    passages: {
      type: "object",
      additionalProperties: {
        type: "array",
        items: {
          type: "object",
          required: ["text", "style"],
          properties: {
            text: { type: "string" },
            style: { type: "string", enum: [...STYLE_TAGS] },
          },
          additionalProperties: false,
        },
      },
    },
  },
  additionalProperties: false,
} as const;
