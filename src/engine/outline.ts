import {
  PDFArray,
  PDFDict,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
  PDFString,
  type PDFDocument,
  type PDFObject,
} from "pdf-lib";

/** One bookmark. `pageIndex` is zero-based in whatever document the tree belongs to. */
export type OutlineNode = {
  title: string;
  pageIndex?: number;
  children: OutlineNode[];
};

const N = {
  Outlines: PDFName.of("Outlines"),
  First: PDFName.of("First"),
  Last: PDFName.of("Last"),
  Next: PDFName.of("Next"),
  Prev: PDFName.of("Prev"),
  Parent: PDFName.of("Parent"),
  Count: PDFName.of("Count"),
  Title: PDFName.of("Title"),
  Dest: PDFName.of("Dest"),
  Dests: PDFName.of("Dests"),
  A: PDFName.of("A"),
  D: PDFName.of("D"),
  S: PDFName.of("S"),
  GoTo: PDFName.of("GoTo"),
  Names: PDFName.of("Names"),
  Kids: PDFName.of("Kids"),
};

function textOf(obj: PDFObject | undefined): string | undefined {
  if (obj instanceof PDFString || obj instanceof PDFHexString) return obj.decodeText();
  if (obj instanceof PDFName) return obj.decodeText();
  return undefined;
}

function lookupNameTree(node: PDFDict | undefined, key: string, depth = 0): PDFObject | undefined {
  if (!node || depth > 32) return undefined;
  const names = node.lookupMaybe(N.Names, PDFArray);
  if (names) {
    for (let i = 0; i + 1 < names.size(); i += 2) {
      if (textOf(names.lookup(i)) === key) return names.lookup(i + 1);
    }
  }
  const kids = node.lookupMaybe(N.Kids, PDFArray);
  if (kids) {
    for (let i = 0; i < kids.size(); i++) {
      const found = lookupNameTree(kids.lookupMaybe(i, PDFDict), key, depth + 1);
      if (found) return found;
    }
  }
  return undefined;
}

function resolveNamedDest(doc: PDFDocument, name: string): PDFObject | undefined {
  const legacy = doc.catalog.lookupMaybe(N.Dests, PDFDict);
  const fromLegacy = legacy?.get(PDFName.of(name));
  if (fromLegacy) return doc.context.lookup(fromLegacy);
  const names = doc.catalog.lookupMaybe(N.Names, PDFDict);
  return lookupNameTree(names?.lookupMaybe(N.Dests, PDFDict), name);
}

/** Names may resolve to further names; chains longer than this are treated as unresolvable. */
const MAX_DEST_HOPS = 8;

function destPageIndex(
  doc: PDFDocument,
  dest: PDFObject | undefined,
  pageIndexByRef: Map<string, number>,
  hops = 0,
): number | undefined {
  if (hops > MAX_DEST_HOPS) return undefined;
  if (dest instanceof PDFName || dest instanceof PDFString || dest instanceof PDFHexString) {
    const name = textOf(dest);
    return name === undefined ? undefined : destPageIndex(doc, resolveNamedDest(doc, name), pageIndexByRef, hops + 1);
  }
  // A named destination may resolve to a dict wrapping the array under /D.
  if (dest instanceof PDFDict) return destPageIndex(doc, dest.lookup(N.D), pageIndexByRef, hops + 1);
  if (!(dest instanceof PDFArray) || dest.size() === 0) return undefined;
  const target = dest.get(0);
  if (target instanceof PDFRef) return pageIndexByRef.get(target.toString());
  if (target instanceof PDFNumber) return target.asNumber();
  return undefined;
}

function itemPageIndex(doc: PDFDocument, item: PDFDict, pageIndexByRef: Map<string, number>): number | undefined {
  const dest = item.lookup(N.Dest);
  if (dest) return destPageIndex(doc, dest, pageIndexByRef);
  const action = item.lookupMaybe(N.A, PDFDict);
  if (action && action.lookup(N.S) === N.GoTo) return destPageIndex(doc, action.lookup(N.D), pageIndexByRef);
  return undefined;
}

/** Reads the document outline. Malformed sibling chains are cut at the first repeat. */
export function readOutline(doc: PDFDocument): OutlineNode[] {
  const root = doc.catalog.lookupMaybe(N.Outlines, PDFDict);
  if (!root) return [];
  const pageIndexByRef = new Map<string, number>();
  doc.getPages().forEach((page, i) => pageIndexByRef.set(page.ref.toString(), i));
  const seen = new Set<PDFDict>();

  const readLevel = (first: PDFDict | undefined): OutlineNode[] => {
    const nodes: OutlineNode[] = [];
    for (let item = first; item && !seen.has(item); item = item.lookupMaybe(N.Next, PDFDict)) {
      seen.add(item);
      nodes.push({
        title: textOf(item.lookup(N.Title)) ?? "",
        pageIndex: itemPageIndex(doc, item, pageIndexByRef),
        children: readLevel(item.lookupMaybe(N.First, PDFDict)),
      });
    }
    return nodes;
  };

  return readLevel(root.lookupMaybe(N.First, PDFDict));
}

/**
 * Moves a source outline into merged page numbering. `pageMap` maps source page index to
 * merged page index; entries without a mapped target are dropped and their surviving
 * children take their place. The source tree is left untouched.
 */
export function rerootOutline(nodes: readonly OutlineNode[], pageMap: ReadonlyMap<number, number>): OutlineNode[] {
  const out: OutlineNode[] = [];
  for (const node of nodes) {
    const children = rerootOutline(node.children, pageMap);
    const mapped = node.pageIndex === undefined ? undefined : pageMap.get(node.pageIndex);
    if (mapped === undefined) out.push(...children);
    else out.push({ title: node.title, pageIndex: mapped, children });
  }
  return out;
}

export function countOutline(nodes: readonly OutlineNode[]): number {
  return nodes.reduce((sum, n) => sum + 1 + countOutline(n.children), 0);
}

/** Replaces the document outline with `nodes`. An empty tree removes the outline. */
export function writeOutline(doc: PDFDocument, nodes: readonly OutlineNode[]) {
  if (nodes.length === 0) {
    doc.catalog.delete(N.Outlines);
    return;
  }
  const context = doc.context;
  const pageRefs = doc.getPages().map((p) => p.ref);
  const rootRef = context.nextRef();

  const writeLevel = (level: readonly OutlineNode[], parentRef: PDFRef, parent: PDFDict) => {
    const refs = level.map(() => context.nextRef());
    level.forEach((node, i) => {
      const item = context.obj({});
      item.set(N.Title, PDFHexString.fromText(node.title));
      item.set(N.Parent, parentRef);
      if (i > 0) item.set(N.Prev, refs[i - 1]);
      if (i < refs.length - 1) item.set(N.Next, refs[i + 1]);
      const pageRef = node.pageIndex === undefined ? undefined : pageRefs[node.pageIndex];
      if (pageRef) item.set(N.Dest, context.obj([pageRef, "XYZ", null, null, null]));
      if (node.children.length) {
        writeLevel(node.children, refs[i], item);
        item.set(N.Count, PDFNumber.of(countOutline(node.children)));
      }
      context.assign(refs[i], item);
    });
    parent.set(N.First, refs[0]);
    parent.set(N.Last, refs[refs.length - 1]);
  };

  const root = context.obj({ Type: "Outlines" });
  writeLevel(nodes, rootRef, root);
  root.set(N.Count, PDFNumber.of(countOutline(nodes)));
  context.assign(rootRef, root);
  doc.catalog.set(N.Outlines, rootRef);
}
