/**
 * Classifies registration targets into routes.
 */

import type { Dispatcher } from "../dispatching/dispatcher.ts";
import { ConfigurationError } from "../errors/mod.ts";
import { Route } from "./route.ts";
import type { PathVariables, RouteMatcher } from "./types.ts";

// Frozen empty variables - single allocation, reused for every match
export const EMPTY_VARIABLES: PathVariables = Object.freeze(
  Object.create(null),
);

const TEMPLATE_VARIABLE = /\{([^{}/]+)\}/g;
const HAS_TEMPLATE_VARIABLE = /\{[^{}/]+\}/;
const REGEX_FLAGS = /^[a-z]*$/;
const NOT_A_DELIMITER = /[A-Za-z0-9\s\\]/;
const SPECIAL_CHARS = /[.*+?^${}()|[\]\\]/g;

/**
 * Split a delimited regular expression target (`~^/cats/(\d+)$~i`) into
 * source and flags.
 *
 * Returns null when the target is not delimited. Targets starting with "/"
 * are paths, never regular expressions.
 */
export function parseDelimitedRegex(
  target: string,
): { source: string; flags: string } | null {
  if (target.length < 2) return null;

  const delimiter = target[0];
  if (delimiter === "/" || NOT_A_DELIMITER.test(delimiter)) {
    return null;
  }

  const end = target.lastIndexOf(delimiter);
  if (end === 0) return null;

  const flags = target.slice(end + 1);
  if (!REGEX_FLAGS.test(flags)) return null;

  return { source: target.slice(1, end), flags };
}

/**
 * Compile a delimited regular expression into a matcher.
 *
 * Positional captures are exposed as "1", "2", ...; named groups under
 * their names. Groups that did not take part in the match are left out.
 *
 * @throws {ConfigurationError} On invalid syntax, unknown flags, or the
 * stateful "g" and "y" flags
 */
export function compileRegex(
  target: string,
  source: string,
  flags: string,
): RouteMatcher {
  if (flags.includes("g") || flags.includes("y")) {
    throw new ConfigurationError(
      `Route pattern flags "g" and "y" are not supported: ${target}`,
    );
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError(`Invalid route pattern: ${target}`, [{
      field: "target",
      message: error instanceof Error ? error.message : String(error),
      code: "invalid_pattern",
    }]);
  }

  return (path) => {
    const match = pattern.exec(path);
    if (!match) return null;
    if (match.length === 1 && !match.groups) return EMPTY_VARIABLES;

    const variables: Record<string, string> = Object.create(null);
    for (let i = 1; i < match.length; i++) {
      if (match[i] !== undefined) {
        variables[String(i)] = match[i];
      }
    }
    if (match.groups) {
      for (const [name, value] of Object.entries(match.groups)) {
        if (value !== undefined) {
          variables[name] = value;
        }
      }
    }
    return variables;
  };
}

/**
 * Compile a URI template (`/users/{userId}/posts/{postId}`).
 *
 * Each `{name}` matches one or more characters other than "/"; the rest
 * of the template matches literally and the whole path must match.
 */
export function compileTemplate(
  template: string,
): { matcher: RouteMatcher; variableNames: string[] } {
  const variableNames: string[] = [];
  let source = "^";
  let last = 0;

  for (const match of template.matchAll(TEMPLATE_VARIABLE)) {
    const index = match.index ?? 0;
    source += escapeRegExp(template.slice(last, index));
    source += "([^/]+)";
    variableNames.push(match[1]);
    last = index + match[0].length;
  }
  source += escapeRegExp(template.slice(last)) + "$";

  const pattern = new RegExp(source);

  const matcher: RouteMatcher = (path) => {
    const match = pattern.exec(path);
    if (!match) return null;

    const variables: Record<string, string> = Object.create(null);
    for (let i = 0; i < variableNames.length; i++) {
      variables[variableNames[i]] = match[i + 1];
    }
    return variables;
  };

  return { matcher, variableNames };
}

function escapeRegExp(literal: string): string {
  return literal.replace(SPECIAL_CHARS, "\\$&");
}

/**
 * Strip the trailing "*" from a prefix target.
 */
export function prefixOf(target: string): string {
  return target.replace(/\*+$/, "");
}

/**
 * Route factory.
 *
 * @example
 * ```typescript
 * const factory = new RouteFactory(dispatcher);
 *
 * factory.create("/about").type;            // "static"
 * factory.create("/assets/*").type;         // "prefix"
 * factory.create("/cats/{id}").type;        // "pattern"
 * factory.create("~^/cats/(\\d+)$~").type;  // "pattern"
 * ```
 */
export class RouteFactory {
  constructor(private readonly dispatcher: Dispatcher) {}

  /**
   * @throws {ConfigurationError} If a regular expression target is invalid
   */
  create(target: string): Route {
    const regex = parseDelimitedRegex(target);
    if (regex) {
      const matcher = compileRegex(target, regex.source, regex.flags);
      return new Route(target, "pattern", matcher, this.dispatcher);
    }

    if (HAS_TEMPLATE_VARIABLE.test(target)) {
      const { matcher, variableNames } = compileTemplate(target);
      return new Route(
        target,
        "pattern",
        matcher,
        this.dispatcher,
        variableNames,
      );
    }

    if (target.endsWith("*")) {
      const prefix = prefixOf(target);
      return new Route(
        target,
        "prefix",
        (path) => path.startsWith(prefix) ? EMPTY_VARIABLES : null,
        this.dispatcher,
      );
    }

    return new Route(
      target,
      "static",
      (path) => path === target ? EMPTY_VARIABLES : null,
      this.dispatcher,
    );
  }
}
