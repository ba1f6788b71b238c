export type AuthorsRoster = {
  emails: Set<string>;
  names: Set<string>;
};

/**
 * Extract internal emails and names from an AUTHORS style roster.
 *
 * Only lines containing `internalDomain` count, comment lines never do.
 * Every `<email>` token on a line is an email; the words before the first
 * token form the name.
 *
 * @example
 * parseAuthorsRoster("Jane Doe <jane@acme.dev> <jd@acme.dev>", { internalDomain: "@acme.dev" })
 * // => { emails: Set {"jane@acme.dev", "jd@acme.dev"}, names: Set {"Jane Doe"} }
 */
export function parseAuthorsRoster(
  text: string,
  { internalDomain, commentMarker = "#" }: { internalDomain: string; commentMarker?: string },
): AuthorsRoster {
  const emails = new Set<string>();
  const names = new Set<string>();

  for (const line of text.split("\n").map((e) => e.replace(/\r$/, ""))) {
    if (line.startsWith(commentMarker)) continue;
    if (!line.includes(internalDomain)) continue;

    const fields = line.split(" ");
    let seenEmail = false;
    fields.forEach((field, i) => {
      if (!(field.length > 1 && field.startsWith("<") && field.endsWith(">"))) return;
      if (!seenEmail) {
        const name = fields.slice(0, i).join(" ");
        if (name) names.add(name);
      }
      seenEmail = true;
      emails.add(field.slice(1, -1));
    });
  }

  return { emails, names };
}

export const parseBlocklist = (csv: string) =>
  new Set(
    csv
      .split(",")
      .map((e) => e.trim())
      .filter(Boolean),
  );
