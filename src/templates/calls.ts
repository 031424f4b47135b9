import Handlebars from "handlebars";

/**
 * A helper invocation found in a template
 */
export interface HelperCall {
  name: string;
  line: number;
}

function isPathExpression(node: hbs.AST.Node): node is hbs.AST.PathExpression {
  return node.type === "PathExpression";
}

function hasArguments(params: readonly hbs.AST.Expression[], hash: hbs.AST.Hash | undefined): boolean {
  return params.length > 0 || (hash?.pairs.length ?? 0) > 0;
}

/**
 * Collects every helper call of a template AST.
 *
 * A call is a mustache, block or sub-expression with a plain (non-data,
 * non-scoped, single segment) name and at least one argument; a
 * sub-expression is always a call.
 */
class HelperCallCollector extends Handlebars.Visitor {
  readonly calls: HelperCall[] = [];

  override MustacheStatement(mustache: hbs.AST.MustacheStatement): void {
    if (hasArguments(mustache.params, mustache.hash)) {
      this.record(mustache.path, mustache.loc);
    }
    super.MustacheStatement(mustache);
  }

  override BlockStatement(block: hbs.AST.BlockStatement): void {
    if (hasArguments(block.params, block.hash)) {
      this.record(block.path, block.loc);
    }
    super.BlockStatement(block);
  }

  override SubExpression(sexpr: hbs.AST.SubExpression): void {
    this.record(sexpr.path, sexpr.loc);
    super.SubExpression(sexpr);
  }

  private record(path: hbs.AST.Node, loc: hbs.AST.SourceLocation): void {
    if (!isPathExpression(path) || path.data || path.depth > 0 || path.parts.length !== 1) {
      return;
    }
    const [name] = path.parts;
    if (name !== undefined) {
      this.calls.push({ name, line: loc.start.line });
    }
  }
}

/**
 * List the helper calls of a parsed template, in source order
 */
export function collectHelperCalls(program: hbs.AST.Program): HelperCall[] {
  const collector = new HelperCallCollector();
  collector.accept(program);
  return collector.calls;
}
