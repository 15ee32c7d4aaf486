import { Command, isContainer } from './ast.js';
import { IndentationError, Result, fail, ok } from './errors.js';

interface Frame {
  commands: Command[];
  depth: number;
}

/**
 * Nests indented command lines under the object they follow. Depth 1 is the
 * object's own list; a line one deeper than the last loop or trigger goes
 * into that container.
 */
export class CommandTreeBuilder {
  private readonly stack: Frame[];

  constructor(root: Command[]) {
    this.stack = [{ commands: root, depth: 1 }];
  }

  private get top(): Frame {
    return this.stack[this.stack.length - 1];
  }

  /** Deepest indentation the next line may have. */
  get maxDepth(): number {
    const last = this.top.commands[this.top.commands.length - 1];
    return last !== undefined && isContainer(last.properties) ? this.top.depth + 1 : this.top.depth;
  }

  push(command: Command, depth: number): Result<void, IndentationError> {
    const top = this.top;
    if (depth < 1 || depth > this.maxDepth) {
      return fail(new IndentationError(this.maxDepth, depth));
    }

    if (depth === top.depth + 1) {
      const container = top.commands[top.commands.length - 1].properties;
      if (isContainer(container)) this.stack.push({ commands: container.commands, depth });
    } else {
      while (this.top.depth > depth) this.stack.pop();
    }

    this.top.commands.push(command);
    return ok(undefined);
  }
}
