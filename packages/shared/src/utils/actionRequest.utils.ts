import {
  ActionRequest,
  Coordinates,
  NavigateDocumentationAction,
  TerminateAction,
} from "../types/actionRequest.types";

/**
 * Type guard factory for action requests
 */
function createActionTypeGuard<T extends ActionRequest>(
  kind: T["kind"],
): (action: ActionRequest) => action is T {
  return (action: ActionRequest): action is T => action.kind === kind;
}

export const isTerminateAction =
  createActionTypeGuard<TerminateAction>("terminate");
export const isNavigateDocumentationAction =
  createActionTypeGuard<NavigateDocumentationAction>("navigate_documentation");

function formatCoordinates(coordinates?: Coordinates): string {
  return coordinates ? ` at (${coordinates.x}, ${coordinates.y})` : "";
}

/**
 * One-line description of an action for logs and tool results. Typed text
 * is never echoed, only its length.
 */
export function describeAction(action: ActionRequest): string {
  switch (action.kind) {
    case "click":
      return `${action.button} click x${action.clickCount}${formatCoordinates(action.coordinates)}`;
    case "move":
      return `move mouse${formatCoordinates(action.coordinates)}`;
    case "type":
      return `type ${action.text.length} characters`;
    case "scroll":
      return `scroll ${action.direction} x${action.amount}${formatCoordinates(action.coordinates)}`;
    case "key":
      return `press ${action.key}`;
    case "wait":
      return `wait ${action.seconds}s`;
    case "screenshot":
      return "take screenshot";
    case "terminate":
      return "complete task";
    case "navigate_documentation":
      return `process documentation: ${action.direction}`;
  }
}
