/**
 * IR formatter for human-readable text output
 */

import { Block } from "../block.js";
import type { Context } from "../context.js";
import { Func } from "../func.js";
import { Inst } from "../inst.js";

export interface FormatterOptions {
  /** Prefix for each nesting level; blocks are nested once */
  indent?: string;
}

export class Formatter {
  private readonly indentUnit: string;
  private indent = 0;
  private output: string[] = [];

  constructor(options: FormatterOptions = {}) {
    this.indentUnit = options.indent ?? "  ";
  }

  format(ctx: Context, func: Func): string {
    this.output = [];
    this.indent = 0;

    this.line(`function ${Func.name(ctx, func)} {`);
    this.indent++;

    // Blocks in layout order, entry first
    for (const block of Func.blocks(ctx, func)) {
      this.formatBlock(ctx, block);
    }

    this.indent--;
    this.line("}");

    return this.output.join("\n");
  }

  private formatBlock(ctx: Context, block: Block): void {
    // Only merge points show their predecessors
    const preds = Block.predecessors(ctx, block).map(({ source }) =>
      Block.name(ctx, source),
    );
    const unique = [...new Set(preds)].sort();
    const predsStr = unique.length > 1 ? ` preds=[${unique.join(", ")}]` : "";
    this.line(`${Block.name(ctx, block)}:${predsStr}`);

    this.indent++;
    for (const inst of Block.instructions(ctx, block)) {
      this.line(Inst.display(ctx, inst));
    }
    this.indent--;
  }

  private line(text: string): void {
    this.output.push(this.indentUnit.repeat(this.indent) + text);
  }
}
