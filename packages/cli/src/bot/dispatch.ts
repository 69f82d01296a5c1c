/**
 * Chat command dispatch.
 *
 * Routes are looked up in an explicit table: exact command names first, then
 * the pattern routes (`/info_123`). Anything that matches no route is ignored.
 * Private routes reply "Unauthorized." to every chat but the operator's and
 * never reach their handler.
 */

import {
  AuthorizationError,
  MalformedInputError,
  createNullLogger,
  describeError,
  type Logger,
} from "@jules-monitor/core";

export interface BotRequest {
  chatId: string;
  text: string;
  /** Everything after the command token, trimmed. */
  args: string;
  /** Capture groups of a pattern route. Empty for named commands. */
  params: string[];
}

export interface BotReply {
  text: string;
  /** Send with HTML parse mode. */
  formatted: boolean;
}

export interface BotResponse {
  replies: BotReply[];
}

export type CommandHandler = (request: BotRequest) => Promise<BotResponse>;

interface RouteBase {
  handler: CommandHandler;
  /** Open to every chat. */
  public?: boolean;
}

export interface CommandRoute extends RouteBase {
  /** Without the leading slash. */
  command: string;
}

export interface PatternRoute extends RouteBase {
  /** Matched against the whole message text. */
  pattern: RegExp;
}

export type Route = CommandRoute | PatternRoute;

export interface DispatcherDeps {
  routes: Route[];
  operatorChatId: string;
  logger?: Logger;
}

export interface Dispatcher {
  /** Resolves to null when the message matches no route. */
  dispatch(chatId: string, text: string): Promise<BotResponse | null>;
}

export const UNAUTHORIZED_REPLY = "Unauthorized.";
export const INTERNAL_ERROR_REPLY = "Something went wrong. Check the logs.";

export function plain(text: string): BotResponse {
  return { replies: [{ text, formatted: false }] };
}

export function html(text: string): BotResponse {
  return { replies: [{ text, formatted: true }] };
}

/**
 * "/info@my_bot 42" -> { command: "info", args: "42" }.
 * Returns null for text that is not a command.
 */
export function parseCommand(text: string): { command: string; args: string } | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;
  return { command: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}

function isCommandRoute(route: Route): route is CommandRoute {
  return "command" in route;
}

function resolve(
  routes: Route[],
  text: string,
): { route: Route; args: string; params: string[] } | null {
  const parsed = parseCommand(text);
  if (parsed) {
    const route = routes.find((r) => isCommandRoute(r) && r.command === parsed.command);
    if (route) return { route, args: parsed.args, params: [] };
  }

  // "/info_42@my_bot" is how group chats send "/info_42".
  const trimmed = text.trim().replace(/^(\/[^\s@]+)@\S+/, "$1");
  for (const route of routes) {
    if (isCommandRoute(route)) continue;
    const match = route.pattern.exec(trimmed);
    if (match) return { route, args: "", params: match.slice(1) };
  }
  return null;
}

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const logger = deps.logger ?? createNullLogger();

  function authorize(route: Route, chatId: string): void {
    if (!route.public && chatId !== deps.operatorChatId) {
      throw new AuthorizationError(chatId);
    }
  }

  return {
    async dispatch(chatId: string, text: string): Promise<BotResponse | null> {
      const resolved = resolve(deps.routes, text);
      if (!resolved) return null;

      try {
        authorize(resolved.route, chatId);
        return await resolved.route.handler({
          chatId,
          text,
          args: resolved.args,
          params: resolved.params,
        });
      } catch (err) {
        if (err instanceof AuthorizationError) {
          logger.warn(`Rejected command from chat ${chatId}`, { text });
          return plain(UNAUTHORIZED_REPLY);
        }
        if (err instanceof MalformedInputError) {
          return plain(err.message);
        }
        logger.error(`Command failed: ${describeError(err)}`, { text });
        return plain(INTERNAL_ERROR_REPLY);
      }
    },
  };
}
