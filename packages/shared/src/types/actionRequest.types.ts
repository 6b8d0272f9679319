export type Coordinates = {
  x: number;
  y: number;
};

export type Button = "left" | "right" | "middle";
export type ScrollDirection = "up" | "down" | "left" | "right";
export type NavigationDirection = "next" | "prev" | "curr";

export type ClickAction = {
  kind: "click";
  coordinates?: Coordinates;
  button: Button;
  clickCount: number;
};

export type MoveAction = {
  kind: "move";
  coordinates: Coordinates;
};

export type TypeAction = {
  kind: "type";
  text: string;
  sensitive?: boolean;
};

export type ScrollAction = {
  kind: "scroll";
  direction: ScrollDirection;
  amount: number;
  coordinates?: Coordinates;
};

/**
 * A single named key ("Return") or a combination joined with "+"
 * ("ctrl+shift+t").
 */
export type KeyAction = {
  kind: "key";
  key: string;
};

export type WaitAction = {
  kind: "wait";
  seconds: number;
};

export type ScreenshotAction = {
  kind: "screenshot";
};

export type TerminateAction = {
  kind: "terminate";
  summary: string;
};

export type NavigateDocumentationAction = {
  kind: "navigate_documentation";
  direction: NavigationDirection;
};

// Actions that reach the display layer
export type ComputerAction =
  | ClickAction
  | MoveAction
  | TypeAction
  | ScrollAction
  | KeyAction
  | WaitAction
  | ScreenshotAction;

export type ActionRequest =
  | ComputerAction
  | TerminateAction
  | NavigateDocumentationAction;
