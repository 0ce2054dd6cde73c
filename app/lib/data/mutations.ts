// React Query mutations

import { useMutation } from "@tanstack/react-query";
import { checklistGateway } from "@/app/lib/data/gateway";
import { queryClient } from "@/app/lib/data/store";
import type { Checklist, ChecklistId } from "@/app/lib/data/types";

export function useCreateChecklistMutation() {
  return useMutation({
    mutationFn: async (name: string) => {
      console.log(`Creating checklist "${name}"`);
      return checklistGateway.create(name);
    },
    onSuccess: () => {
      queryClient.invalidateQueries({ queryKey: ["checklists"] });
    },
  });
}

export function useRenameChecklistMutation() {
  return useMutation({
    mutationFn: async ({ id, name }: { id: ChecklistId; name: string }) => {
      await checklistGateway.rename(id, name);
    },
    onSuccess: (_data, { id }) => {
      queryClient.invalidateQueries({ queryKey: ["checklists"] });
      queryClient.invalidateQueries({ queryKey: ["checklist", id] });
    },
  });
}

export function useDeleteChecklistMutation() {
  return useMutation({
    mutationFn: async (id: ChecklistId) => {
      await checklistGateway.remove(id);
    },
    onSuccess: (_data, id) => {
      queryClient.removeQueries({ queryKey: ["checklist", id] });
      queryClient.invalidateQueries({ queryKey: ["checklists"] });
    },
  });
}

export function useMoveChecklistMutation() {
  return useMutation({
    mutationFn: async ({
      fromIndex,
      toIndex,
    }: {
      fromIndex: number;
      toIndex: number;
    }) => {
      await checklistGateway.move(fromIndex, toIndex);
    },
    onSuccess: () => {
      queryClient.invalidateQueries({ queryKey: ["checklists"] });
    },
  });
}

/**
 * Writes the whole checklist. The cached copy is replaced rather than
 * refetched, so an open session is not reloaded under the user.
 */
export function useSaveChecklistMutation() {
  return useMutation({
    mutationFn: async ({
      id,
      checklist,
    }: {
      id: ChecklistId;
      checklist: Checklist;
    }) => {
      await checklistGateway.save(checklist, id);
    },
    onSuccess: (_data, { id, checklist }) => {
      queryClient.setQueryData(["checklist", id], checklist);
      queryClient.invalidateQueries({ queryKey: ["checklists"] });
    },
  });
}
