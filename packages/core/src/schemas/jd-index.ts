import { z } from "zod";
import {
  categoryInArea,
  categoryOfId,
  isAreaCode,
  isCategoryCode,
  isIdCode,
} from "../codes/parse.js";
import { isFolderNameFor } from "../codes/match.js";

export const AreaCodeSchema = z
  .string()
  .refine(isAreaCode, { message: "Area code must look like 10-19" });

export const CategoryCodeSchema = z
  .string()
  .refine(isCategoryCode, { message: "Category code must be two digits" });

export const IdCodeSchema = z
  .string()
  .refine(isIdCode, { message: "ID code must look like 11.01" });

export const IdEntrySchema = z.object({
  name: z.string(),
  section: z.boolean().optional(),
});

export const CategorySchema = z.object({
  name: z.string(),
  ids: z.record(IdCodeSchema, IdEntrySchema),
});

export const AreaSchema = z.object({
  name: z.string(),
  categories: z.record(CategoryCodeSchema, CategorySchema),
});

/**
 * The cached hierarchy: areas → categories → ids, each keyed by code.
 * Containment is checked here so a loaded index never breaks it.
 */
export const JdIndexSchema = z
  .object({
    areas: z.record(AreaCodeSchema, AreaSchema),
  })
  .superRefine((index, ctx) => {
    // Folder paths are rebuilt from these names
    const checkName = (code: string, name: string, path: string[]) => {
      if (!isFolderNameFor(code, name)) {
        ctx.addIssue({
          code: "custom",
          message: `Name of ${code} must be more than its code`,
          path: [...path, "name"],
        });
      }
    };

    for (const [areaCode, area] of Object.entries(index.areas)) {
      checkName(areaCode, area.name, ["areas", areaCode]);
      for (const [categoryCode, category] of Object.entries(area.categories)) {
        checkName(categoryCode, category.name, ["areas", areaCode, "categories", categoryCode]);
        if (!categoryInArea(categoryCode, areaCode)) {
          ctx.addIssue({
            code: "custom",
            message: `Category ${categoryCode} is outside area ${areaCode}`,
            path: ["areas", areaCode, "categories", categoryCode],
          });
        }
        for (const [idCode, entry] of Object.entries(category.ids)) {
          checkName(idCode, entry.name, [
            "areas",
            areaCode,
            "categories",
            categoryCode,
            "ids",
            idCode,
          ]);
          if (categoryOfId(idCode) !== categoryCode) {
            ctx.addIssue({
              code: "custom",
              message: `ID ${idCode} does not belong to category ${categoryCode}`,
              path: ["areas", areaCode, "categories", categoryCode, "ids", idCode],
            });
          }
        }
      }
    }
  });

export type IdEntry = z.infer<typeof IdEntrySchema>;
export type Category = z.infer<typeof CategorySchema>;
export type Area = z.infer<typeof AreaSchema>;
export type JdIndex = z.infer<typeof JdIndexSchema>;
