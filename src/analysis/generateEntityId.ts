import type { EntityId, FilePath } from "../shared/GraphTypes.js";
import { normalizePath } from "./normalizePath.js";

/**
 * Generate the identity key of a file or project entity.
 *
 * @example
 * generateFileId("apps\\web\\src\\main.ts") // => "apps/web/src/main.ts"
 */
export const generateFileId = (filePath: FilePath): EntityId =>
  normalizePath(filePath);

/**
 * Generate the identity key of a declaration or member.
 *
 * Format: `{path}:{symbol}`. The kind is deliberately not part of the key so
 * that a class later refined into a component keeps a single identity.
 *
 * @example
 * generateEntityId("src/app.component.ts", "AppComponent")
 * // => "src/app.component.ts:AppComponent"
 * generateEntityId("src/app.component.ts", "AppComponent.ngOnInit")
 * // => "src/app.component.ts:AppComponent.ngOnInit"
 */
export const generateEntityId = (
  filePath: FilePath,
  symbolName: string,
): EntityId => `${normalizePath(filePath)}:${symbolName}`;
