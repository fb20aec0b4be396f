import { describe, it } from "mocha";
import { expect } from "chai";

import { buildToolDescriptor, leadingProperties, ToolDefinitionSchema } from "../src/tools/descriptor.js";

describe("tool descriptors", () => {
  it("uses the title as name and marks every property required", () => {
    const definition = ToolDefinitionSchema.parse({
      title: "ask",
      description: "Ask the operator",
      properties: {
        question: { type: "string", description: "What to ask" },
        tags: { type: "array", description: "Labels", itemsType: "string" },
      },
    });

    const descriptor = buildToolDescriptor(definition);

    expect(descriptor).to.deep.equal({
      name: "ask",
      title: "ask",
      description: "Ask the operator",
      inputSchema: {
        type: "object",
        properties: {
          question: { type: "string", description: "What to ask" },
          tags: { type: "array", description: "Labels", items: { type: "string" } },
        },
        required: ["question", "tags"],
      },
    });
    expect(Object.isFrozen(descriptor)).to.equal(true);
    expect(Object.isFrozen(descriptor.inputSchema.properties)).to.equal(true);
  });

  it("keeps an explicit name distinct from the title", () => {
    const descriptor = buildToolDescriptor(ToolDefinitionSchema.parse({ name: "lookup", title: "Look up" }));
    expect(descriptor.name).to.equal("lookup");
    expect(descriptor.title).to.equal("Look up");
    expect(descriptor.description).to.equal("");
    expect(descriptor.inputSchema.required).to.deep.equal([]);
  });

  it("rejects a definition without a title", () => {
    expect(ToolDefinitionSchema.safeParse({ properties: {} }).success).to.equal(false);
    expect(ToolDefinitionSchema.safeParse({ title: "   " }).success).to.equal(false);
  });

  it("lists the leading properties in declaration order", () => {
    const descriptor = buildToolDescriptor(
      ToolDefinitionSchema.parse({
        title: "t",
        properties: {
          b: { type: "string", description: "second letter" },
          a: { type: "string", description: "first letter" },
          c: { type: "number" },
        },
      }),
    );

    expect(leadingProperties(descriptor, 2)).to.deep.equal([
      { name: "b", description: "second letter" },
      { name: "a", description: "first letter" },
    ]);
    expect(leadingProperties(descriptor, 5)).to.have.length(3);
  });
});
