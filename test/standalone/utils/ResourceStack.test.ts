import {describe, expect, test} from "vitest";
import {ResourceStack} from "../../../src/utils/ResourceStack.js";


describe("utils", () => {
    describe("ResourceStack", () => {
        test("releases in reverse acquisition order", async () => {
            const released: string[] = [];
            const stack = new ResourceStack();

            stack.push("backend", () => void released.push("backend"));
            stack.push("model", async () => {
                await new Promise((accept) => setTimeout(accept, 0));
                released.push("model");
            });
            stack.push("context", () => void released.push("context"));

            expect(stack.names).to.eql(["backend", "model", "context"]);
            expect(stack.size).to.eql(3);

            await stack.releaseAll(() => {
                throw new Error("no release should fail");
            });

            expect(released).to.eql(["context", "model", "backend"]);
            expect(stack.empty).to.eql(true);
        });

        test("a failed release doesn't stop the others", async () => {
            const released: string[] = [];
            const failures: string[] = [];
            const stack = new ResourceStack();

            stack.push("backend", () => void released.push("backend"));
            stack.push("model", () => {
                throw new Error("busy");
            });
            stack.push("context", () => void released.push("context"));

            await stack.releaseAll((name, error) => {
                failures.push(`${name}: ${error instanceof Error ? error.message : String(error)}`);
            });

            expect(released).to.eql(["context", "backend"]);
            expect(failures).to.eql(["model: busy"]);
            expect(stack.empty).to.eql(true);
        });
    });
});
