export * from "./types/actionRequest.types";
export * from "./types/messageContent.types";
export * from "./utils/actionRequest.utils";
export * from "./utils/messageContent.utils";
