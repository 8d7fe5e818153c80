import { IMPORT_MODES, type ImportMode, type PendingChange } from "./import.types";

export function isImportMode(value: string): value is ImportMode {
  return (IMPORT_MODES as readonly string[]).includes(value);
}

/** Whether `mode` applies a change of this kind. Decided per change at apply time. */
export function modeAllows(mode: ImportMode, action: PendingChange["action"]) {
  switch (mode) {
    case "update_existing":
      return action === "update";
    case "add_new":
      return action === "add";
    case "full_sync":
      return true;
  }
}
