import addressparser from "nodemailer/lib/addressparser/index.js";

type ParsedEntry = ReturnType<typeof addressparser>[number];

interface Mailbox {
  name: string;
  address: string;
}

/** Expand `Group: a@x, b@y;` entries into their members. */
function mailboxes(entries: ParsedEntry[]): Mailbox[] {
  const out: Mailbox[] = [];
  for (const entry of entries) {
    if ("group" in entry) {
      out.push(...mailboxes(entry.group));
    } else {
      out.push({ name: entry.name, address: entry.address });
    }
  }
  return out;
}

/**
 * Extract the bare address from a header value such as
 * `HR Team <hr@example.com>`. Falls back to the raw value when the parser
 * finds no address.
 */
export function bareAddress(raw: string): string {
  if (raw.trim() === "") return raw;
  const first = mailboxes(addressparser(raw)).find((m) => m.address);
  return first ? first.address : raw;
}

/**
 * Split a To/Cc/Bcc header into one string per recipient, keeping the
 * display name as `Name <addr>`.
 */
export function splitAddressList(header: string): string[] {
  if (header.trim() === "") return [];
  return mailboxes(addressparser(header))
    .filter((m) => m.address || m.name)
    .map((m) => (m.name && m.address ? `${m.name} <${m.address}>` : m.address || m.name));
}
