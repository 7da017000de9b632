/**
 * Board form decoding: flat `days[<index>][<field>]` keys (with nested
 * `[meals][<type>][<field>]`) into day-update payloads ordered by index.
 */

export type FormTree = { [key: string]: string | FormTree };

const DAY_FIELD_PATTERN = /^days\[(\d+)\]((?:\[[^[\]]+\])+)$/;
const SEGMENT_PATTERN = /\[([^[\]]+)\]/g;

function assignNested(target: FormTree, keys: string[], value: string): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const existing = node[key];
    if (existing !== undefined && typeof existing !== 'string') {
      node = existing;
      continue;
    }
    const child: FormTree = {};
    node[key] = child;
    node = child;
  }
  const leaf = keys[keys.length - 1];
  if (leaf !== undefined) node[leaf] = value;
}

/**
 * Later entries for the same key win, so a hidden `off` input followed by a
 * checkbox reads as `on` only when the box is ticked.
 * Keys outside the `days[...]` grammar are ignored.
 */
export function decodeDayForm(
  entries: Iterable<readonly [string, string]>,
): FormTree[] {
  const byIndex = new Map<number, FormTree>();

  for (const [name, value] of entries) {
    const match = DAY_FIELD_PATTERN.exec(name);
    if (!match) continue;
    const [, index, path] = match;
    if (index === undefined || path === undefined) continue;

    const keys = Array.from(path.matchAll(SEGMENT_PATTERN), (m) => m[1]).filter(
      (key): key is string => key !== undefined,
    );
    const dayIndex = Number(index);
    const day = byIndex.get(dayIndex) ?? {};
    assignNested(day, keys, value);
    byIndex.set(dayIndex, day);
  }

  return [...byIndex.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, day]) => day);
}

/** String entries of a submitted form; file uploads are dropped. */
export function formDataEntries(form: FormData): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  form.forEach((value, key) => {
    if (typeof value === 'string') entries.push([key, value]);
  });
  return entries;
}
