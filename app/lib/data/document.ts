// Checklist document serialization and legacy migration.

import { DOMImplementation, DOMParser, XMLSerializer } from "@xmldom/xmldom";
import {
  DOCUMENT_SCHEMA,
  FIRST_CUSTOM_LEGACY_NUMBER,
  LEGACY_STATE_TAGS,
  XML_DECLARATION,
} from "./documentSchema";
import type {
  Checklist,
  ChecklistItem,
  ItemId,
  StateDefinition,
  StateSymbol,
  StatusNumber,
} from "./types";
import {
  createDefaultCatalog,
  FALLBACK_STATE_COLOR,
  isStateSymbol,
  replaceCatalog,
} from "@/app/lib/states";
import { createShortId, MalformedDocumentError } from "@/app/lib/utils";

export const UNTITLED_CHECKLIST = "Untitled";

export const createEmptyChecklist = (
  name: string = UNTITLED_CHECKLIST,
): Checklist => ({
  name,
  catalog: createDefaultCatalog(),
  items: [],
});

const isElement = (node: Node): node is Element => node.nodeType === 1;

function childElements(parent: Element, tagName: string): Element[] {
  const elements: Element[] = [];
  const nodes = parent.childNodes;
  for (let index = 0; index < nodes.length; index += 1) {
    const node = nodes.item(index);
    if (node && isElement(node) && node.nodeName === tagName) {
      elements.push(node);
    }
  }
  return elements;
}

function readAttribute(element: Element, name: string): string | null {
  return element.hasAttribute(name) ? element.getAttribute(name) : null;
}

function parseInteger(value: string | null): number | null {
  if (value === null || !/^-?\d+$/.test(value.trim())) {
    return null;
  }
  return Number.parseInt(value, 10);
}

export function serializeChecklist(checklist: Checklist): string {
  const document = new DOMImplementation().createDocument(
    null,
    DOCUMENT_SCHEMA.root,
    null,
  );
  const root = document.documentElement;
  root.setAttribute("name", checklist.name);
  root.setAttribute(
    "default-state",
    String(checklist.catalog.defaultStatusNumber),
  );

  const statesElement = document.createElement(DOCUMENT_SCHEMA.states);
  for (const state of checklist.catalog.states) {
    const stateElement = document.createElement(DOCUMENT_SCHEMA.state);
    stateElement.setAttribute("number", String(state.number));
    stateElement.setAttribute("label", state.label);
    stateElement.setAttribute("color", state.color);
    stateElement.setAttribute("symbol", state.symbol);
    stateElement.setAttribute("in-cycle", state.inCycle ? "true" : "false");
    statesElement.appendChild(stateElement);
  }
  root.appendChild(statesElement);

  const appendItems = (parent: Element, items: ChecklistItem[]) => {
    for (const item of items) {
      const itemElement = document.createElement(DOCUMENT_SCHEMA.item);
      itemElement.setAttribute("id", item.id);
      itemElement.setAttribute("text", item.text);
      itemElement.setAttribute("state-number", String(item.statusNumber));
      if (item.collapsed && item.children.length > 0) {
        itemElement.setAttribute("collapsed", "true");
      }
      appendItems(itemElement, item.children);
      parent.appendChild(itemElement);
    }
  };

  const itemsElement = document.createElement(DOCUMENT_SCHEMA.items);
  appendItems(itemsElement, checklist.items);
  root.appendChild(itemsElement);

  return `${XML_DECLARATION}\n${new XMLSerializer().serializeToString(document)}\n`;
}

function parseDocument(text: string): Element {
  const parseErrors: string[] = [];
  let document: Document;

  try {
    document = new DOMParser({
      errorHandler: {
        error: (message: string) => parseErrors.push(String(message)),
        fatalError: (message: string) => parseErrors.push(String(message)),
      },
    }).parseFromString(text, "text/xml");
  } catch (error) {
    throw new MalformedDocumentError(
      error instanceof Error ? error.message : String(error),
    );
  }

  if (parseErrors.length > 0) {
    throw new MalformedDocumentError(parseErrors[0]);
  }

  const root = document.documentElement;
  if (!root || root.nodeName !== DOCUMENT_SCHEMA.root) {
    throw new MalformedDocumentError(
      `missing <${DOCUMENT_SCHEMA.root}> root element`,
    );
  }

  return root;
}

/**
 * Reads a checklist document, upgrading legacy status tags on the way.
 * Missing or repeated item ids are replaced with fresh ones.
 *
 * @throws MalformedDocumentError when the text is not a checklist document.
 */
export function parseChecklist(
  text: string,
  createId: () => ItemId = createShortId,
): Checklist {
  const root = parseDocument(text);

  // Legacy tag -> status number, for documents that still use string tags.
  const legacyNumbers = new Map<string, StatusNumber>();
  const usedNumbers = new Set<StatusNumber>();
  const states: StateDefinition[] = [];

  const nextCustomLegacyNumber = () => {
    let number = FIRST_CUSTOM_LEGACY_NUMBER;
    while (usedNumbers.has(number)) {
      number += 1;
    }
    return number;
  };

  const [statesElement] = childElements(root, DOCUMENT_SCHEMA.states);
  for (const stateElement of statesElement
    ? childElements(statesElement, DOCUMENT_SCHEMA.state)
    : []) {
    const symbol = readAttribute(stateElement, "symbol");
    const label = readAttribute(stateElement, "label") ?? "";
    const color = readAttribute(stateElement, "color") ?? FALLBACK_STATE_COLOR;
    let number = parseInteger(readAttribute(stateElement, "number"));
    let legacySymbol: StateSymbol | null = null;

    if (number === null) {
      const tag = readAttribute(stateElement, "id");
      if (tag === null) {
        continue;
      }
      const legacy = LEGACY_STATE_TAGS.get(tag);
      number = legacy?.number ?? nextCustomLegacyNumber();
      legacySymbol = legacy?.symbol ?? null;
      legacyNumbers.set(tag, number);
    }

    if (usedNumbers.has(number)) {
      continue;
    }
    usedNumbers.add(number);

    states.push({
      number,
      label,
      color,
      symbol: isStateSymbol(symbol) ? symbol : (legacySymbol ?? "square"),
      inCycle: readAttribute(stateElement, "in-cycle") !== "false",
    });
  }

  const catalog =
    states.length > 0
      ? replaceCatalog(
          states,
          parseInteger(readAttribute(root, "default-state")) ?? 0,
        )
      : createDefaultCatalog();

  const readStatus = (itemElement: Element): StatusNumber => {
    const number = parseInteger(readAttribute(itemElement, "state-number"));
    if (number !== null) {
      return number;
    }

    const tag = readAttribute(itemElement, "state");
    if (tag === null) {
      return 0;
    }

    return (
      legacyNumbers.get(tag) ??
      LEGACY_STATE_TAGS.get(tag)?.number ??
      parseInteger(tag) ??
      0
    );
  };

  const seenIds = new Set<ItemId>();
  const readItems = (parent: Element): ChecklistItem[] =>
    childElements(parent, DOCUMENT_SCHEMA.item).map((itemElement) => {
      let id = readAttribute(itemElement, "id");
      while (!id || seenIds.has(id)) {
        id = createId();
      }
      seenIds.add(id);

      const children = readItems(itemElement);
      return {
        id,
        text: readAttribute(itemElement, "text") ?? "",
        statusNumber: readStatus(itemElement),
        collapsed:
          readAttribute(itemElement, "collapsed") === "true" &&
          children.length > 0,
        children,
      };
    });

  const [itemsElement] = childElements(root, DOCUMENT_SCHEMA.items);

  return {
    name: readAttribute(root, "name") ?? UNTITLED_CHECKLIST,
    catalog,
    items: itemsElement ? readItems(itemsElement) : [],
  };
}

/**
 * Like `parseChecklist`, but a malformed document yields an empty checklist
 * with the default catalog.
 */
export function loadChecklistDocument(
  text: string,
  fallbackName: string = UNTITLED_CHECKLIST,
): Checklist {
  try {
    return parseChecklist(text);
  } catch (error) {
    if (!(error instanceof MalformedDocumentError)) {
      throw error;
    }

    console.warn(
      `Replacing malformed checklist "${fallbackName}": ${error.reason}`,
    );
    return createEmptyChecklist(fallbackName);
  }
}
