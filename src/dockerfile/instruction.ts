/**
 * Dockerfile instructions as a closed tagged union.
 *
 * `formatInstruction` is the single place that decides the textual form of
 * an instruction; the image tag is a hash of that text, so any change here
 * invalidates every cached image.
 */

export type BuildInstruction =
  | { readonly kind: "from"; readonly image: string }
  | { readonly kind: "comment"; readonly text: string }
  | { readonly kind: "env"; readonly key: string; readonly value: string }
  | { readonly kind: "arg"; readonly key: string; readonly value: string }
  | { readonly kind: "run"; readonly command: string }
  | { readonly kind: "user"; readonly uid: number; readonly gid?: number }
  | { readonly kind: "copy"; readonly source: string; readonly destination: string };

/** Instruction constructors. */
export const Instruction = {
  from: (image: string): BuildInstruction => ({ kind: "from", image }),
  comment: (text: string): BuildInstruction => ({ kind: "comment", text }),
  env: (key: string, value: string): BuildInstruction => ({ kind: "env", key, value }),
  arg: (key: string, value: string): BuildInstruction => ({ kind: "arg", key, value }),
  run: (command: string): BuildInstruction => ({ kind: "run", command }),
  user: (uid: number, gid?: number): BuildInstruction => ({ kind: "user", uid, gid }),
  copy: (source: string, destination: string): BuildInstruction => ({ kind: "copy", source, destination }),
};

export function formatInstruction(instruction: BuildInstruction): string {
  switch (instruction.kind) {
    case "from":
      return `FROM ${instruction.image}`;
    case "comment":
      return `# ${instruction.text}`;
    case "env":
      return `ENV ${instruction.key}=${instruction.value}`;
    case "arg":
      return `ARG ${instruction.key}=${instruction.value}`;
    case "run":
      return `RUN ${instruction.command}`;
    case "user":
      return instruction.gid !== undefined
        ? `USER ${instruction.uid}:${instruction.gid}`
        : `USER ${instruction.uid}`;
    case "copy":
      return `COPY ${instruction.source} ${instruction.destination}`;
  }
}
