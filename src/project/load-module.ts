import { createJiti } from "jiti";

/**
 * Import a `.ts` or `.js` module at run time and return its default
 * export, or the module itself when it has none.
 */
export const importModuleDefault = async (
  modulePath: string,
): Promise<unknown> => {
  const jiti = createJiti(import.meta.url);
  const loaded: unknown = await jiti.import(modulePath);
  return typeof loaded === "object" && loaded !== null && "default" in loaded
    ? (loaded.default ?? loaded)
    : loaded;
};
