/**
 * Replacement Templates
 *
 * `$n` and `${n}` insert numbered groups, `$name` and `${name}` named ones,
 * `$$` a literal dollar. An unbraced reference takes the longest run of
 * letters, digits and underscores after the `$`. References to groups that
 * do not exist or did not participate expand to nothing.
 */

export interface MatchGroups {
  /** Index 0 is the whole match */
  captures: ReadonlyArray<string | undefined>;
  named: Readonly<Record<string, string | undefined>>;
}

const NAME_CHAR = /[A-Za-z0-9_]/;

function lookup(groups: MatchGroups, reference: string): string {
  if (/^\d+$/.test(reference)) {
    return groups.captures[Number(reference)] ?? '';
  }
  return Object.hasOwn(groups.named, reference) ? (groups.named[reference] ?? '') : '';
}

export function expandTemplate(template: string, groups: MatchGroups): string {
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
      const reference = close === -1 ? '' : template.slice(i + 2, close);
      if (close !== -1 && reference.length > 0 && [...reference].every((c) => NAME_CHAR.test(c))) {
        out += lookup(groups, reference);
        i = close + 1;
        continue;
      }
      out += '$';
      i++;
      continue;
    }

    let end = i + 1;
    while (end < template.length && NAME_CHAR.test(template[end] ?? '')) end++;
    if (end === i + 1) {
      out += '$';
      i++;
      continue;
    }
    out += lookup(groups, template.slice(i + 1, end));
    i = end;
  }
  return out;
}

/**
 * Groups of a RegExp match.
 */
export function groupsOf(match: RegExpMatchArray): MatchGroups {
  return { captures: [...match], named: { ...(match.groups ?? {}) } };
}
