import { createMessageBuilder, MESSAGE_FORMATS, MessageFormatOption } from "../message/builder-factory";
import type { Message } from "../message/message";
import { Sender } from "../message/sender";
import { printBuildSummary, printMessage, printRawMessage } from "../output/reporter";
import type { FormatSelection } from "../schemas/cli-schemas";
import { TracingMessageBuilder } from "./tracing-builder";
import { OutputStyle, type BuildOptions, type BuildResult } from "./types";

/*
 * Expands a format selection into the formats to build, in output order.
 */
export function resolveFormats(selection: FormatSelection): MessageFormatOption[] {
  switch (selection) {
    case "json":
      return [MessageFormatOption.Json];
    case "xml":
      return [MessageFormatOption.Xml];
    case "all":
      return [...MESSAGE_FORMATS];
  }
}

/*
 * Builds one message per requested format through the same Sender and
 * prints each as soon as it is built. A SerializationError stops the run
 * and reaches the caller as-is; messages already printed stay printed.
 */
export function buildMessages(options: BuildOptions): BuildResult {
  const sender = options.sender ?? new Sender();
  const messages: Message[] = [];

  for (const format of options.formats) {
    const builder = new TracingMessageBuilder(createMessageBuilder(format));
    const message = sender.buildMessage(builder);
    messages.push(message);

    if (options.outputStyle === OutputStyle.Raw) {
      printRawMessage(message);
    } else {
      printMessage(message);
    }
  }

  if (options.outputStyle === OutputStyle.Line) {
    printBuildSummary(messages.length);
  }
  return { messages };
}
