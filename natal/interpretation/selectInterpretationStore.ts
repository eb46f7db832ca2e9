import type {
  InterpretationSource,
  InterpretationStore,
} from "./interpretationStore.js";
import { createLocalInterpretationStore } from "./localInterpretationStore.js";
import { createSupabaseInterpretationStore } from "./supabaseInterpretationStore.js";

export function resolveInterpretationSource(
  raw: string | undefined = process.env.NATAL_INTERPRETATION_SOURCE
): InterpretationSource {
  const source = (raw ?? "local").trim().toLowerCase();
  if (source === "local" || source === "supabase") return source;
  throw new Error(
    `Unknown NATAL_INTERPRETATION_SOURCE "${raw}"; expected "local" or "supabase"`
  );
}

export function selectInterpretationStore(
  source: InterpretationSource = resolveInterpretationSource()
): InterpretationStore {
  return source === "supabase"
    ? createSupabaseInterpretationStore()
    : createLocalInterpretationStore();
}
