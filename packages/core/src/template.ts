/**
 * Replacement templates
 *
 * `$0` / `${0}` is the whole match, `$1` / `${1}` numbered groups,
 * `$name` / `${name}` named groups and `$$` a literal dollar sign. A bare
 * reference takes the longest run of `[A-Za-z0-9_]`, so `$1a` names a group
 * called `1a`; write `${1}a` to follow group 1 with a letter. Unknown or
 * non-participating groups expand to the empty string.
 */

const NAME_CHAR = /[A-Za-z0-9_]/;

function groupValue(match: RegExpMatchArray, name: string): string {
  if (/^\d+$/.test(name)) {
    return match[Number(name)] ?? '';
  }
  return match.groups?.[name] ?? '';
}

export function expandReplacement(template: string, match: RegExpMatchArray): string {
  let out = '';
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    if (ch !== '$') {
      out += ch;
      i++;
      continue;
    }

    const next = template[i + 1];

    if (next === '$') {
      out += '$';
      i += 2;
      continue;
    }

    if (next === '{') {
      const close = template.indexOf('}', i + 2);
      const name = close === -1 ? '' : template.slice(i + 2, close);
      if (name.length > 0 && [...name].every((c) => NAME_CHAR.test(c))) {
        out += groupValue(match, name);
        i = close + 1;
      } else {
        out += '$';
        i++;
      }
      continue;
    }

    let end = i + 1;
    while (end < template.length && NAME_CHAR.test(template[end] ?? '')) end++;

    if (end === i + 1) {
      out += '$';
      i++;
    } else {
      out += groupValue(match, template.slice(i + 1, end));
      i = end;
    }
  }

  return out;
}

export interface ReplaceResult {
  text: string;
  count: number;
}

/**
 * Replace every non-overlapping match in one left-to-right pass.
 * The expression must carry the `g` flag.
 */
export function replaceAllMatches(text: string, regex: RegExp, template: string): ReplaceResult {
  let out = '';
  let last = 0;
  let count = 0;

  for (const match of text.matchAll(regex)) {
    const index = match.index ?? 0;
    out += text.slice(last, index) + expandReplacement(template, match);
    last = index + match[0].length;
    count++;
  }

  if (count === 0) return { text, count };

  return { text: out + text.slice(last), count };
}
