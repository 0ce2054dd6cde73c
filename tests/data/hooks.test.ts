import { QueryClientProvider } from "@tanstack/react-query";
import { act, renderHook, waitFor } from "@testing-library/react";
import { createElement, type ReactNode } from "react";
import { beforeEach, describe, expect, it } from "vitest";
import {
  useChecklistSession,
  useVisibleRows,
} from "../../app/lib/data/derivedData";
import { checklistGateway } from "../../app/lib/data/gateway";
import {
  useCreateChecklistMutation,
  useDeleteChecklistMutation,
  useMoveChecklistMutation,
  useRenameChecklistMutation,
  useSaveChecklistMutation,
} from "../../app/lib/data/mutations";
import {
  useChecklistIndexQuery,
  useChecklistQuery,
} from "../../app/lib/data/queries";
import { clearDb, queryClient } from "../../app/lib/data/store";
import type { Checklist } from "../../app/lib/data/types";
import { createDefaultCatalog } from "../../app/lib/states";

function wrapper({ children }: { children: ReactNode }) {
  return createElement(QueryClientProvider, { client: queryClient }, children);
}

const names = (entries: { name: string }[] | undefined) =>
  entries?.map((entry) => entry.name);

describe("checklist queries and mutations", () => {
  beforeEach(async () => {
    queryClient.clear();
    await clearDb();
  });

  it("refreshes the index after create, rename, move and delete", async () => {
    const { result } = renderHook(
      () => ({
        index: useChecklistIndexQuery(),
        create: useCreateChecklistMutation(),
        rename: useRenameChecklistMutation(),
        move: useMoveChecklistMutation(),
        remove: useDeleteChecklistMutation(),
      }),
      { wrapper },
    );

    await waitFor(() => expect(result.current.index.data).toEqual([]));

    let firstId = "";
    await act(async () => {
      firstId = await result.current.create.mutateAsync("Packing");
      await result.current.create.mutateAsync("Errands");
    });
    await waitFor(() =>
      expect(names(result.current.index.data)).toEqual(["Packing", "Errands"]),
    );

    await act(async () => {
      await result.current.rename.mutateAsync({ id: firstId, name: "Travel" });
    });
    await waitFor(() =>
      expect(names(result.current.index.data)).toEqual(["Travel", "Errands"]),
    );

    await act(async () => {
      await result.current.move.mutateAsync({ fromIndex: 0, toIndex: 1 });
    });
    await waitFor(() =>
      expect(names(result.current.index.data)).toEqual(["Errands", "Travel"]),
    );

    await act(async () => {
      await result.current.remove.mutateAsync(firstId);
    });
    await waitFor(() =>
      expect(names(result.current.index.data)).toEqual(["Errands"]),
    );
  });

  it("stays idle until a checklist is selected", () => {
    const { result } = renderHook(() => useChecklistQuery(null), { wrapper });

    expect(result.current.fetchStatus).toBe("idle");
    expect(result.current.data).toBeUndefined();
  });

  it("loads a checklist and replaces the cached copy on save", async () => {
    const id = await checklistGateway.create("Garden");
    const { result } = renderHook(
      () => ({
        checklist: useChecklistQuery(id),
        save: useSaveChecklistMutation(),
      }),
      { wrapper },
    );

    await waitFor(() =>
      expect(result.current.checklist.data?.name).toBe("Garden"),
    );

    const edited: Checklist = {
      name: "Garden",
      catalog: createDefaultCatalog(),
      items: [
        {
          id: "w1",
          text: "Weed beds",
          statusNumber: 0,
          collapsed: false,
          children: [],
        },
      ],
    };
    await act(async () => {
      await result.current.save.mutateAsync({ id, checklist: edited });
    });

    expect(result.current.checklist.data).toEqual(edited);
    expect(await checklistGateway.load(id)).toEqual(edited);
  });
});

describe("useChecklistSession", () => {
  beforeEach(async () => {
    queryClient.clear();
    await clearDb();
  });

  it("repaints on edits and saves pending work on unmount", async () => {
    const id = await checklistGateway.create("Chores");
    const initial = await checklistGateway.load(id);
    const { result, unmount } = renderHook(
      () => useChecklistSession(id, initial),
      { wrapper },
    );

    let itemId = "";
    act(() => {
      itemId = result.current.session.addRootItem();
    });
    act(() => {
      result.current.session.setText(itemId, "Take out bins");
    });

    expect(result.current.checklist.items).toEqual([
      {
        id: itemId,
        text: "Take out bins",
        statusNumber: 0,
        collapsed: false,
        children: [],
      },
    ]);

    unmount();

    await waitFor(async () =>
      expect((await checklistGateway.load(id)).items[0]?.text).toBe(
        "Take out bins",
      ),
    );
  });

  it("keeps the session and saves under the latest id", async () => {
    const firstId = await checklistGateway.create("Chores");
    const secondId = await checklistGateway.create("Chores copy");
    const initial = await checklistGateway.load(firstId);
    const { result, rerender } = renderHook(
      ({ id }: { id: string }) => useChecklistSession(id, initial),
      { wrapper, initialProps: { id: firstId } },
    );
    const { session } = result.current;

    rerender({ id: secondId });
    expect(result.current.session).toBe(session);

    act(() => {
      session.addRootItem();
    });
    await act(async () => {
      await session.flush();
    });

    expect((await checklistGateway.load(secondId)).items).toHaveLength(1);
    expect((await checklistGateway.load(firstId)).items).toEqual([]);
  });
});

describe("useVisibleRows", () => {
  it("pairs visible rows with their resolved state", () => {
    const checklist: Checklist = {
      name: "Rows",
      catalog: createDefaultCatalog(),
      items: [
        {
          id: "p",
          text: "Parent",
          statusNumber: 9,
          collapsed: true,
          children: [
            {
              id: "c",
              text: "Child",
              statusNumber: 1,
              collapsed: false,
              children: [],
            },
          ],
        },
        {
          id: "q",
          text: "Other",
          statusNumber: 2,
          collapsed: false,
          children: [],
        },
      ],
    };

    const { result } = renderHook(() => useVisibleRows(checklist));

    expect(
      result.current.map(({ item, depth, state }) => [
        item.id,
        depth,
        state.label,
      ]),
    ).toEqual([
      ["p", 0, "To Do"],
      ["q", 0, "Waiting"],
    ]);
  });
});
