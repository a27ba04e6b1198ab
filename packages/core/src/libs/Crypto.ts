import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";

/** keccak256 of the canonical encoding of a state */
export function hashState(state: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(state)));
}

/** Next link of a hash chain: H(prevHash || encode(data)) */
export function chainHash(prevHash: string, data: unknown): string {
  return keccak256(toUtf8Bytes(prevHash + canonicalEncode(data)));
}
