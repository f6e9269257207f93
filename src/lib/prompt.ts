import prompts, { type PromptObject } from "prompts";

type NamedPrompt = PromptObject & { name: string };
async function ask<T = string>(q: NamedPrompt): Promise<T | undefined> {
  const res: Record<string, T | undefined> = await prompts(q, { onCancel: () => void 0 });
  return res[q.name];
}

export const Input = {
  async prompt(opts: { message: string; validate?: (v: string) => boolean | string }) {
    return (await ask<string>({
      type: "text",
      name: "value",
      message: opts.message,
      validate: opts.validate,
    })) ?? "";
  },
};

export const Secret = {
  async prompt(opts: { message: string }) {
    return (await ask<string>({ type: "password", name: "value", message: opts.message })) ?? "";
  },
};
