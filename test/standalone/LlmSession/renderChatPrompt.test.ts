import {describe, expect, test} from "vitest";
import {compileChatTemplate} from "../../../src/evaluator/SessionParams.js";
import {renderChatPrompt} from "../../../src/evaluator/LlmSession/utils/renderChatPrompt.js";
import {unwrapResult} from "../../../src/result/Result.js";
import {SessionErrorCode} from "../../../src/result/SessionErrorCode.js";
import {FakeEngine} from "../../utils/FakeEngine.js";
import type {ChatMessage} from "../../../src/types.js";

async function loadFakeModel(engine: FakeEngine) {
    const model = await engine.loadModel("model.gguf", {gpuLayers: 0});
    if (model == null)
        throw new Error("Fake model failed to load");

    return model;
}


describe("LlmSession", () => {
    describe("renderChatPrompt", () => {
        test("model chat template", async () => {
            const engine = new FakeEngine();
            const model = await loadFakeModel(engine);

            const res = renderChatPrompt({
                model,
                conversation: [
                    {role: "system", content: "Be brief"},
                    {role: "user", content: "Hi", images: [{data: new Uint8Array(8)}]}
                ],
                maxLength: 1000
            });

            expect(res).to.eql({ok: true, value: "<|system|>Be brief\n<|user|>Hi\n<|assistant|>"});
            expect(engine.lastTemplateMessages).to.eql([
                {role: "system", content: "Be brief"},
                {role: "user", content: "Hi"}
            ]);
        });

        test("model chat template failure", async () => {
            const engine = new FakeEngine();
            const model = await loadFakeModel(engine);
            engine.failApplyChatTemplate = true;

            expect(renderChatPrompt({model, conversation: [{role: "user", content: "Hi"}], maxLength: 1000})).to.eql({
                ok: false,
                error: SessionErrorCode.TokenizationFailed,
                message: "Failed to apply chat template. Prompt may be too long or template invalid."
            });
        });

        test("prompt longer than the max length", async () => {
            const engine = new FakeEngine();
            const model = await loadFakeModel(engine);
            const conversation: ChatMessage[] = [{role: "user", content: "Hi"}];

            // "<|user|>Hi\n<|assistant|>" is 24 characters long
            expect(renderChatPrompt({model, conversation, maxLength: 24})).to.eql({
                ok: true,
                value: "<|user|>Hi\n<|assistant|>"
            });
            expect(renderChatPrompt({model, conversation, maxLength: 23})).to.eql({
                ok: false,
                error: SessionErrorCode.TokenizationFailed,
                message: "Failed to apply chat template. Prompt may be too long or template invalid."
            });
        });

        test("max length is measured in UTF-8 bytes", async () => {
            const engine = new FakeEngine();
            const model = await loadFakeModel(engine);
            const conversation: ChatMessage[] = [{role: "user", content: "漢字"}];

            // 24 characters, 28 bytes
            expect(renderChatPrompt({model, conversation, maxLength: 28})).to.eql({
                ok: true,
                value: "<|user|>漢字\n<|assistant|>"
            });
            expect(renderChatPrompt({model, conversation, maxLength: 27})).to.eql({
                ok: false,
                error: SessionErrorCode.TokenizationFailed,
                message: "Failed to apply chat template. Prompt may be too long or template invalid."
            });
        });

        test("Jinja chat template", async () => {
            const engine = new FakeEngine();
            const model = await loadFakeModel(engine);
            const chatTemplate = unwrapResult(compileChatTemplate(
                "{% for message in messages %}[{{ message.role }}] {{ message.content }};{% endfor %}" +
                "{% if add_generation_prompt %}[assistant]{% endif %}"
            ));

            const res = renderChatPrompt({
                model,
                conversation: [
                    {role: "system", content: "Be brief"},
                    {role: "user", content: "Hi"}
                ],
                chatTemplate,
                maxLength: 1000
            });

            expect(res).to.eql({ok: true, value: "[system] Be brief;[user] Hi;[assistant]"});
            expect(engine.lastTemplateMessages).to.eql(null);
        });

        test("Jinja chat template that fails to render", async () => {
            const engine = new FakeEngine();
            const model = await loadFakeModel(engine);
            const chatTemplate = unwrapResult(compileChatTemplate("{{ undefined_fn() }}"));

            const res = renderChatPrompt({
                model,
                conversation: [{role: "user", content: "Hi"}],
                chatTemplate,
                maxLength: 1000
            });

            expect(res.ok).to.eql(false);
            if (!res.ok) {
                expect(res.error).to.eql(SessionErrorCode.TokenizationFailed);
                expect(res.message.startsWith("Failed to render the chat template: ")).to.eql(true);
            }
        });
    });
});
