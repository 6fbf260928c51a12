import { z } from "zod";

export const PropertyValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
]);

export const PropertiesSchema = z.record(z.string(), PropertyValueSchema);
