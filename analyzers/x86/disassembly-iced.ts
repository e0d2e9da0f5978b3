"use strict";

export type IcedInstruction = {
  code: number;
  length: number;
  ip: bigint;
  nextIP: bigint;
  readonly flowControl: number;
  readonly nearBranchTarget: bigint;
  op0Kind: number;
  readonly opCount: number;
  opKind(operand: number): number;
  immediate(operand: number): bigint;
  readonly isIpRelMemoryOperand: boolean;
  readonly ipRelMemoryAddress: bigint;
  readonly memoryBase: number;
  readonly memoryIndex: number;
  readonly memoryDisplacement: bigint;
  free(): void;
};

export type IcedDecoder = {
  ip: bigint;
  canDecode: boolean;
  position: number;
  decodeOut(instruction: IcedInstruction): void;
  free(): void;
};

export type IcedFormatter = {
  signedImmediateOperands: boolean;
  formatMnemonic(instruction: IcedInstruction): string;
  operandCount(instruction: IcedInstruction): number;
  formatOperand(instruction: IcedInstruction, operand: number): string;
  getInstructionOperand(instruction: IcedInstruction, operand: number): number | undefined;
  free(): void;
};

type IcedEnum = Record<string, number> & Record<number, string | undefined>;

export type IcedX86Module = {
  Code: IcedEnum;
  Decoder: new (bitness: number, data: Uint8Array, options: number) => IcedDecoder;
  DecoderOptions: { None: number };
  FlowControl: IcedEnum;
  Formatter: new (syntax: number) => IcedFormatter;
  FormatterSyntax: { Intel: number };
  OpKind: IcedEnum;
  Register: IcedEnum;
  Instruction: new () => IcedInstruction;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

export const isIcedX86Module = (value: unknown): value is IcedX86Module => {
  if (!isRecord(value)) return false;

  const decoderOptions = value["DecoderOptions"];
  if (!isRecord(decoderOptions) || typeof decoderOptions["None"] !== "number") return false;

  const formatterSyntax = value["FormatterSyntax"];
  if (!isRecord(formatterSyntax) || typeof formatterSyntax["Intel"] !== "number") return false;

  const code = value["Code"];
  if (!isRecord(code) || typeof code["INVALID"] !== "number") return false;

  const register = value["Register"];
  if (!isRecord(register) || typeof register["None"] !== "number") return false;

  const flowControl = value["FlowControl"];
  const opKind = value["OpKind"];
  if (!isRecord(flowControl) || !isRecord(opKind)) return false;

  return (
    typeof value["Decoder"] === "function" &&
    typeof value["Instruction"] === "function" &&
    typeof value["Formatter"] === "function"
  );
};

/** Loads iced-x86; CommonJS builds may only expose their exports on `default`. */
export async function loadIcedX86(): Promise<IcedX86Module> {
  const loaded: unknown = await import("iced-x86");
  if (isIcedX86Module(loaded)) return loaded;
  if (isRecord(loaded) && isIcedX86Module(loaded["default"])) return loaded["default"];
  throw new Error("Failed to load iced-x86 disassembler (unexpected module shape).");
}

export const safeFree = (resource: { free(): void } | null | undefined): void => {
  if (!resource) return;
  try {
    resource.free();
  } catch (err) {
    // iced-x86 objects own WASM allocations; a second free() throws and means nothing here.
    if (!(err instanceof Error)) throw err;
  }
};
