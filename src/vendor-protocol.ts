/**
 * Requests the inverter accepts under its private function code 0x41:
 * the login handshake and the file upload procedure.
 *
 * Every payload here starts at the sub-command byte, right after the
 * function code. Answers are checked strictly; anything that does not
 * parse is a {@link TransportError} of kind `ProtocolError`.
 */

import { createHash, createHmac } from "node:crypto";
import { TransportError } from "./errors";

export const PRIVATE_FUNCTION_CODE = 0x41;

const CHALLENGE = 0x24;
const LOGIN = 0x25;
const START_UPLOAD = 0x05;
const UPLOAD_FRAME = 0x06;
const COMPLETE_UPLOAD = 0x0c;

/** Length of both the inverter's and the client's login challenge. */
export const CHALLENGE_LENGTH = 16;

function malformed(what: string, detail: string): TransportError {
  return new TransportError("ProtocolError", `Malformed ${what} answer: ${detail}`);
}

function expectSubcommand(answer: Buffer, subcommand: number, what: string): void {
  if (answer.length === 0 || answer[0] !== subcommand) {
    const got = answer.length === 0 ? "nothing" : String(answer[0]);
    throw malformed(what, `expected sub-command ${subcommand}, got ${got}`);
  }
}

// ---------- Login ----------

/** HMAC-SHA256 over `seed`, keyed with the SHA-256 of the password. */
export function loginDigest(password: string, seed: Uint8Array): Buffer {
  const key = createHash("sha256").update(password, "utf8").digest();
  return createHmac("sha256", key).update(seed).digest();
}

export function challengeRequest(): Buffer {
  return Buffer.from([CHALLENGE, 0x01, 0x00]);
}

/** The inverter's 16-byte challenge. */
export function parseChallenge(answer: Buffer): Buffer {
  expectSubcommand(answer, CHALLENGE, "login challenge");
  if (answer.length < 2 + CHALLENGE_LENGTH || answer[1] !== 0x11) {
    throw malformed("login challenge", `unexpected content of ${answer.length} bytes`);
  }
  return answer.subarray(2, 2 + CHALLENGE_LENGTH);
}

export function loginRequest(
  username: string,
  password: string,
  inverterChallenge: Uint8Array,
  clientChallenge: Uint8Array
): Buffer {
  const user = Buffer.from(username, "utf8");
  const mac = loginDigest(password, inverterChallenge);
  const length = clientChallenge.length + 1 + user.length + 1 + mac.length;
  if (length > 0xff) {
    throw new RangeError(`username of ${user.length} bytes is too long`);
  }
  return Buffer.concat([
    Buffer.from([LOGIN, length]),
    clientChallenge,
    Buffer.from([user.length]),
    user,
    Buffer.from([mac.length]),
    mac,
  ]);
}

export interface LoginAnswer {
  accepted: boolean;
  /** The inverter's digest of the client challenge; empty when rejected. */
  mac: Buffer;
}

export function parseLoginAnswer(answer: Buffer): LoginAnswer {
  expectSubcommand(answer, LOGIN, "login");
  if (answer.length < 3) {
    throw malformed("login", `only ${answer.length} bytes`);
  }
  if (answer[2] !== 0) return { accepted: false, mac: Buffer.alloc(0) };
  const macLength = answer.length > 3 ? answer[3] : 0;
  const mac = answer.subarray(4, 4 + macLength);
  if (mac.length !== macLength) {
    throw malformed("login", `digest of ${mac.length} bytes, expected ${macLength}`);
  }
  return { accepted: true, mac };
}

// ---------- File upload ----------

export interface UploadStart {
  fileType: number;
  fileLength: number;
  /** Bytes carried by each frame. */
  frameLength: number;
  customizedData: Buffer;
}

export function startUploadRequest(
  fileType: number,
  customizedData: Uint8Array = Buffer.alloc(0)
): Buffer {
  return Buffer.concat([
    Buffer.from([START_UPLOAD, 1 + customizedData.length, fileType]),
    customizedData,
  ]);
}

export function parseUploadStart(answer: Buffer): UploadStart {
  expectSubcommand(answer, START_UPLOAD, "upload start");
  const content = answer.subarray(1);
  if (content.length < 7) {
    throw malformed("upload start", `only ${content.length} bytes of content`);
  }
  const customizedData = content.subarray(7);
  if (customizedData.length !== content[0] - 6) {
    throw malformed("upload start", `length byte ${content[0]} does not match the content`);
  }
  const start = {
    fileType: content[1],
    fileLength: content.readUInt32BE(2),
    frameLength: content[6],
    customizedData,
  };
  if (start.frameLength === 0 && start.fileLength > 0) {
    throw malformed("upload start", "frame length is zero");
  }
  return start;
}

export function uploadFrameRequest(fileType: number, frameNo: number): Buffer {
  const request = Buffer.from([UPLOAD_FRAME, 3, fileType, 0, 0]);
  request.writeUInt16BE(frameNo, 3);
  return request;
}

export interface UploadFrame {
  fileType: number;
  frameNo: number;
  data: Buffer;
}

export function parseUploadFrame(answer: Buffer): UploadFrame {
  expectSubcommand(answer, UPLOAD_FRAME, "upload frame");
  const content = answer.subarray(1);
  if (content.length < 4) {
    throw malformed("upload frame", `only ${content.length} bytes of content`);
  }
  const data = content.subarray(4);
  if (data.length !== content[0] - 3) {
    throw malformed("upload frame", `length byte ${content[0]} does not match the content`);
  }
  return { fileType: content[1], frameNo: content.readUInt16BE(2), data };
}

export function completeUploadRequest(fileType: number): Buffer {
  return Buffer.from([COMPLETE_UPLOAD, 1, fileType]);
}

/** CRC-16/Modbus of the whole file, as announced by the inverter. */
export function parseUploadComplete(answer: Buffer): number {
  expectSubcommand(answer, COMPLETE_UPLOAD, "upload completion");
  const content = answer.subarray(1);
  if (content.length < 4 || content[0] !== 3) {
    throw malformed("upload completion", `unexpected content of ${content.length} bytes`);
  }
  return content.readUInt16BE(2);
}
