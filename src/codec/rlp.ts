// RLP encode/decode of the account packet stored under the login entry.

import * as rlp from "rlp";
import type { AccountPacket } from "../core/types";
import { utf8 } from "../utils/bytes";

const TAG_ACC_PKT = 0;
const TAG_WITH_INVITATION = 1;

/* helpers */
const toText = (b: Uint8Array): string => Buffer.from(b).toString("utf8");
const toInt = (b: Uint8Array): number => (b.length === 0 ? 0 : Number.parseInt(Buffer.from(b).toString("hex"), 16));

const field = (fields: rlp.NestedUint8Array, i: number): Uint8Array => {
  const f = fields[i];
  if (!(f instanceof Uint8Array)) throw new Error(`malformed account packet: field ${i} is not a byte string`);
  return f;
};

/* AccountPacket */
export const encAccountPacket = (p: AccountPacket): Uint8Array =>
  p.type === "withInvitation"
    ? rlp.encode([TAG_WITH_INVITATION, utf8(p.invitationString), p.accPkt])
    : rlp.encode([TAG_ACC_PKT, p.accPkt]);

export const decAccountPacket = (b: Uint8Array): AccountPacket => {
  const decoded = rlp.decode(b);
  if (decoded instanceof Uint8Array) throw new Error("malformed account packet: expected a list");

  const tag = toInt(field(decoded, 0));
  if (tag === TAG_WITH_INVITATION && decoded.length === 3) {
    return {
      type: "withInvitation",
      invitationString: toText(field(decoded, 1)),
      accPkt: field(decoded, 2),
    };
  }
  if (tag === TAG_ACC_PKT && decoded.length === 2) {
    return { type: "accPkt", accPkt: field(decoded, 1) };
  }
  throw new Error(`malformed account packet: tag ${tag} with ${decoded.length} fields`);
};
