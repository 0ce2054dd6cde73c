// React Query query hooks.
// All hooks here should return objects shaped like `useQuery`.

import { useQuery } from "@tanstack/react-query";
import { checklistGateway } from "@/app/lib/data/gateway";
import type { ChecklistId } from "@/app/lib/data/types";

function getQueryArgs_checklistIndex() {
  return {
    queryKey: ["checklists"],
    queryFn: async () => {
      console.log("Fetching checklist index");
      return checklistGateway.list();
    },
  };
}

export function useChecklistIndexQuery() {
  return useQuery(getQueryArgs_checklistIndex());
}

function getQueryArgs_checklist(id: ChecklistId | null) {
  return {
    queryKey: ["checklist", id],
    enabled: id !== null,
    queryFn: async () => {
      if (id === null) {
        return null;
      }
      console.log(`Loading checklist ${id}`);
      return checklistGateway.load(id);
    },
  };
}

/** Disabled while no checklist is selected. */
export function useChecklistQuery(id: ChecklistId | null) {
  return useQuery(getQueryArgs_checklist(id));
}
