import type {Template} from "@huggingface/jinja";
import {failure, Result, success} from "../../../result/Result.js";
import {SessionErrorCode} from "../../../result/SessionErrorCode.js";
import type {EngineChatMessage, EngineModel} from "../../../bindings/EngineTypes.js";
import type {ChatMessage} from "../../../types.js";

const chatTemplateFailedMessage = "Failed to apply chat template. Prompt may be too long or template invalid.";

/**
 * Render a conversation into a prompt, ending with the assistant turn opening.
 * Uses the given Jinja template when there is one, and the model's own chat template otherwise.
 *
 * The UTF-8 encoded prompt may not be longer than `maxLength` bytes.
 */
export function renderChatPrompt({
    model, conversation, chatTemplate, maxLength
}: {
    model: EngineModel,
    conversation: readonly ChatMessage[],
    chatTemplate?: Template,
    maxLength: number
}): Result<string> {
    const messages: EngineChatMessage[] = conversation.map((message) => ({
        role: message.role,
        content: message.content
    }));

    let prompt: string | null;
    if (chatTemplate != null) {
        try {
            prompt = chatTemplate.render({
                messages,
                "add_generation_prompt": true,
                "bos_token": "",
                "eos_token": ""
            });
        } catch (err) {
            return failure(
                SessionErrorCode.TokenizationFailed,
                `Failed to render the chat template: ${err instanceof Error ? err.message : String(err)}`
            );
        }
    } else
        prompt = model.applyChatTemplate(messages, true);

    if (prompt == null || Buffer.byteLength(prompt, "utf8") > maxLength)
        return failure(SessionErrorCode.TokenizationFailed, chatTemplateFailedMessage);

    return success(prompt);
}
