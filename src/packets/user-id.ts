import type { RawPacket, UserIdRecord } from "~/types";

const utf8 = new TextDecoder("utf-8");

const WITH_EMAIL = /^(.*?)\s*<([^<>]*)>\s*$/;
const BARE_EMAIL = /^[^\s<>@]+@[^\s<>@]+$/;
const WITH_COMMENT = /^(.*?)\s*\(([^()]*)\)$/;

/**
 * Split a User ID into name, comment and email
 *
 * Handles the conventional `Name (Comment) <email>` form; a bare address
 * becomes the email, anything else is the name.
 */
export function splitUserId(
  text: string,
): Pick<UserIdRecord, "name" | "email" | "comment"> {
  const trimmed = text.trim();
  let rest = trimmed;
  let email = "";

  const withEmail = WITH_EMAIL.exec(trimmed);
  if (withEmail) {
    rest = withEmail[1] ?? "";
    email = (withEmail[2] ?? "").trim();
  } else if (BARE_EMAIL.test(trimmed)) {
    return { name: "", email: trimmed, comment: "" };
  }

  const withComment = WITH_COMMENT.exec(rest);
  if (withComment) {
    return {
      name: (withComment[1] ?? "").trim(),
      email,
      comment: withComment[2] ?? "",
    };
  }

  return { name: rest.trim(), email, comment: "" };
}

/** View a User ID packet (RFC 9580 §5.11) */
export function parseUserId(packet: RawPacket): UserIdRecord {
  const text = utf8.decode(packet.body);
  return { kind: "userId", tag: packet.tag, text, ...splitUserId(text) };
}
