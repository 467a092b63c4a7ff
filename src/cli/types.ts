import type { Message } from "../message/message";
import type { MessageFormatOption } from "../message/builder-factory";
import type { Sender } from "../message/sender";

export enum OutputStyle {
  Line = "line",
  Raw = "raw",
}

export interface BuildOptions {
  formats: readonly MessageFormatOption[];
  outputStyle: OutputStyle;
  sender?: Sender;
}

export interface BuildResult {
  messages: Message[];
}
