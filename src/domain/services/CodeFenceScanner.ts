export interface Fence {
  marker: "`" | "~";
  length: number;
  info: string;
  openLine: number;
  closeLine: number | null;
}

const OPENING_FENCE = /^ {0,3}(`{3,}|~{3,})(.*)$/;

function closesFence(line: string, fence: Fence): boolean {
  const match = /^ {0,3}(`{3,}|~{3,})[ \t]*$/.exec(line);
  if (!match) return false;
  const run = match[1];
  return run[0] === fence.marker && run.length >= fence.length;
}

/**
 * Find fenced code blocks in Markdown. Lines are 0-based.
 */
export function scanFences(markdown: string): Fence[] {
  const fences: Fence[] = [];
  const lines = markdown.split("\n");
  let open: Fence | null = null;

  lines.forEach((line, index) => {
    if (open) {
      if (closesFence(line, open)) {
        open.closeLine = index;
        open = null;
      }
      return;
    }

    const match = OPENING_FENCE.exec(line);
    if (!match) return;

    const [, run, rest] = match;
    const marker = run[0] === "`" ? "`" : "~";
    // Backtick fences cannot carry backticks in their info string
    if (marker === "`" && rest.includes("`")) return;

    open = {
      marker,
      length: run.length,
      info: rest.trim(),
      openLine: index,
      closeLine: null,
    };
    fences.push(open);
  });

  return fences;
}

export function lineOfOffset(text: string, offset: number): number {
  let line = 0;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === "\n") line++;
  }
  return line;
}

export function isInsideFence(fences: Fence[], line: number): boolean {
  return fences.some(
    (fence) =>
      line > fence.openLine &&
      (fence.closeLine === null || line < fence.closeLine)
  );
}
