"use strict";

import type { IcedDecoder, IcedFormatter, IcedInstruction, IcedX86Module } from "./disassembly-iced.js";
import { safeFree } from "./disassembly-iced.js";

export type CodeRegion = {
  vaddrStart: bigint;
  data: Uint8Array;
};

export type DecodedOperand = {
  text: string;
  isImmediate: boolean;
  value: bigint | null;
};

export type DecodedInstruction = {
  address: bigint;
  nextAddress: bigint;
  mnemonic: string;
  operands: DecodedOperand[];
  isCall: boolean;
  endsBlock: boolean;
  branchTarget: bigint | null;
  memoryTargets: bigint[];
  immediateValues: bigint[];
};

export type DecodedBlock = {
  start: bigint;
  end: bigint;
  instructions: DecodedInstruction[];
};

export type DecodedFunction = {
  start: bigint;
  blocks: DecodedBlock[];
  callTargets: bigint[];
};

export type FunctionFlowDecoderOptions = {
  iced: IcedX86Module;
  bitness: 32 | 64;
  regions: CodeRegion[];
};

export type FunctionFlowOptions = {
  start: bigint;
  // Exclusive end from a sized symbol; unsized functions run until they return or reach another function.
  end: bigint | null;
  isFunctionStart: (vaddr: bigint) => boolean;
  issues: string[];
};

const MAX_INSTRUCTIONS_PER_FUNCTION = 100_000;

const isNearBranch = (opKind: number, OpKind: IcedX86Module["OpKind"]): boolean =>
  opKind === OpKind["NearBranch16"] || opKind === OpKind["NearBranch32"] || opKind === OpKind["NearBranch64"];

const tryGetOffsetInRegion = (vaddr: bigint, region: CodeRegion): number | null => {
  const end = region.vaddrStart + BigInt(region.data.length);
  if (vaddr < region.vaddrStart || vaddr >= end) return null;
  const offset = Number(vaddr - region.vaddrStart);
  return Number.isSafeInteger(offset) ? offset : null;
};

const compareBigints = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

const isImmediateKind = (kind: number, OpKind: IcedX86Module["OpKind"]): boolean =>
  (OpKind[kind] ?? "").startsWith("Immediate");

const collectOperands = (
  iced: IcedX86Module,
  formatter: IcedFormatter,
  instr: IcedInstruction
): DecodedOperand[] => {
  const operands: DecodedOperand[] = [];
  const count = formatter.operandCount(instr);
  for (let index = 0; index < count; index += 1) {
    const text = formatter.formatOperand(instr, index);
    const instructionOperand = formatter.getInstructionOperand(instr, index);
    const isImmediate =
      instructionOperand !== undefined && isImmediateKind(instr.opKind(instructionOperand), iced.OpKind);
    operands.push({
      text,
      isImmediate,
      value: isImmediate && instructionOperand !== undefined ? instr.immediate(instructionOperand) : null
    });
  }
  return operands;
};

const collectMemoryTargets = (iced: IcedX86Module, instr: IcedInstruction): bigint[] => {
  const targets: bigint[] = [];
  for (let index = 0; index < instr.opCount; index += 1) {
    if (instr.opKind(index) !== iced.OpKind["Memory"]) continue;
    if (instr.isIpRelMemoryOperand) {
      targets.push(BigInt.asUintN(64, instr.ipRelMemoryAddress));
    } else if (instr.memoryBase === iced.Register["None"]) {
      targets.push(BigInt.asUintN(64, instr.memoryDisplacement));
    }
  }
  return targets;
};

/**
 * Splits decoded instructions into basic blocks at `leaders`, after block-ending
 * instructions and across gaps. Blocks come out in address order.
 */
export const splitIntoBlocks = (
  instructions: DecodedInstruction[],
  leaders: ReadonlySet<bigint>
): DecodedBlock[] => {
  const sorted = [...instructions].sort((a, b) => compareBigints(a.address, b.address));
  const blocks: DecodedBlock[] = [];
  let current: DecodedBlock | null = null;
  let previous: DecodedInstruction | null = null;
  for (const instruction of sorted) {
    const startsBlock =
      current == null ||
      previous == null ||
      leaders.has(instruction.address) ||
      previous.endsBlock ||
      previous.nextAddress !== instruction.address;
    if (startsBlock || current == null) {
      current = { start: instruction.address, end: instruction.nextAddress, instructions: [] };
      blocks.push(current);
    }
    current.instructions.push(instruction);
    current.end = instruction.nextAddress;
    previous = instruction;
  }
  return blocks;
};

/**
 * Recursive-traversal decoder for single functions. Direct jumps and conditional branches
 * inside a function are followed; jumps to other functions are tail calls, and calls are
 * reported for the caller to queue. The decoders and formatter hold WASM memory until
 * `free()` is called.
 */
export class FunctionFlowDecoder {
  private readonly iced: IcedX86Module;
  private readonly decoders: Array<CodeRegion & { decoder: IcedDecoder }>;
  private readonly formatter: IcedFormatter;
  private readonly instr: IcedInstruction;

  constructor(opts: FunctionFlowDecoderOptions) {
    this.iced = opts.iced;
    this.decoders = opts.regions.map(region => ({
      ...region,
      decoder: new opts.iced.Decoder(opts.bitness, region.data, opts.iced.DecoderOptions.None)
    }));
    this.formatter = new opts.iced.Formatter(opts.iced.FormatterSyntax.Intel);
    this.formatter.signedImmediateOperands = true;
    this.instr = new opts.iced.Instruction();
  }

  private getDecoderForVaddr(vaddr: bigint): (CodeRegion & { decoder: IcedDecoder }) | null {
    for (const entry of this.decoders) {
      if (tryGetOffsetInRegion(vaddr, entry) != null) return entry;
    }
    return null;
  }

  isExecutable(vaddr: bigint): boolean {
    return this.getDecoderForVaddr(vaddr) != null;
  }

  decodeFunction(opts: FunctionFlowOptions): DecodedFunction {
    const { iced, formatter, instr } = this;
    const insideFunction = (vaddr: bigint): boolean =>
      vaddr >= opts.start && (opts.end == null || vaddr < opts.end) && this.isExecutable(vaddr);
    const belongsToOtherFunction = (vaddr: bigint): boolean => vaddr !== opts.start && opts.isFunctionStart(vaddr);

    const decoded = new Map<bigint, DecodedInstruction>();
    const leaders = new Set<bigint>([opts.start]);
    const callTargets: bigint[] = [];
    const queue: bigint[] = [opts.start];

    const addBranchTarget = (target: bigint): void => {
      if (!insideFunction(target) || belongsToOtherFunction(target)) return;
      leaders.add(target);
      if (!decoded.has(target)) queue.push(target);
    };

    while (queue.length > 0) {
      const startVaddr = queue.pop();
      if (startVaddr == null) break;
      if (decoded.has(startVaddr)) continue;

      const decoderEntry = this.getDecoderForVaddr(startVaddr);
      const offset = decoderEntry ? tryGetOffsetInRegion(startVaddr, decoderEntry) : null;
      if (!decoderEntry || offset == null) {
        opts.issues.push(`Address 0x${startVaddr.toString(16)} is outside the executable regions.`);
        continue;
      }
      const decoder = decoderEntry.decoder;
      decoder.position = offset;
      decoder.ip = startVaddr;

      while (decoder.canDecode) {
        if (decoded.size >= MAX_INSTRUCTIONS_PER_FUNCTION) {
          opts.issues.push(
            `Function 0x${opts.start.toString(16)} exceeds ${MAX_INSTRUCTIONS_PER_FUNCTION} instructions; truncated.`
          );
          queue.length = 0;
          break;
        }
        const vaddr = BigInt.asUintN(64, decoder.ip);
        if (decoded.has(vaddr)) {
          leaders.add(vaddr);
          break;
        }
        decoder.decodeOut(instr);
        if (instr.length <= 0 || instr.code === iced.Code["INVALID"]) {
          opts.issues.push(`Stopping at an invalid instruction at address 0x${vaddr.toString(16)}.`);
          break;
        }

        const flow = instr.flowControl;
        const nextAddress = BigInt.asUintN(64, instr.nextIP);
        const branchTarget = isNearBranch(instr.op0Kind, iced.OpKind) ? BigInt.asUintN(64, instr.nearBranchTarget) : null;
        const isCall = flow === iced.FlowControl["Call"] || flow === iced.FlowControl["IndirectCall"];
        const isUnconditional = flow === iced.FlowControl["UnconditionalBranch"];
        const isConditional = flow === iced.FlowControl["ConditionalBranch"];
        const stops =
          isUnconditional ||
          flow === iced.FlowControl["IndirectBranch"] ||
          flow === iced.FlowControl["Return"] ||
          flow === iced.FlowControl["Interrupt"] ||
          flow === iced.FlowControl["Exception"];

        const operands = collectOperands(iced, formatter, instr);
        decoded.set(vaddr, {
          address: vaddr,
          nextAddress,
          mnemonic: formatter.formatMnemonic(instr),
          operands,
          isCall,
          endsBlock: stops || isConditional,
          branchTarget,
          memoryTargets: collectMemoryTargets(iced, instr),
          immediateValues: operands.flatMap(operand => (operand.value != null ? [operand.value] : []))
        });

        if (isCall) {
          if (branchTarget != null) callTargets.push(branchTarget);
        } else if (branchTarget != null && (isUnconditional || isConditional)) {
          addBranchTarget(branchTarget);
        }
        if (isConditional) leaders.add(nextAddress);
        if (stops) break;
        if (!insideFunction(nextAddress) || belongsToOtherFunction(nextAddress)) break;
        if (this.getDecoderForVaddr(nextAddress) !== decoderEntry) break;
      }
    }

    return {
      start: opts.start,
      blocks: splitIntoBlocks([...decoded.values()], leaders),
      callTargets
    };
  }

  free(): void {
    safeFree(this.instr);
    safeFree(this.formatter);
    for (const entry of this.decoders) safeFree(entry.decoder);
  }
}
