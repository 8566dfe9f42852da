const PAGE_BREAK = 0;

// "1,2,0,3,0" -> [[1, 2], [3], []]. Layouts without a comma carry no page data.
export function decodeAttemptLayout(layout: string | null | undefined): number[][] {
  if (!layout || !layout.includes(",")) {
    return [];
  }

  const pages: number[][] = [[]];
  for (const token of layout.split(",")) {
    const trimmed = token.trim();
    if (!/^\d+$/.test(trimmed)) {
      continue;
    }
    const slot = Number(trimmed);
    if (slot === PAGE_BREAK) {
      pages.push([]);
    } else {
      pages[pages.length - 1].push(slot);
    }
  }

  return pages;
}

export function getPageSlots(pages: number[][], page: number) {
  const slots = pages[page];
  if (!slots) {
    return [];
  }
  return [...slots].sort((a, b) => a - b);
}
