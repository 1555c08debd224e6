/**
 * Few-shot examples: input/output pairs rendered ahead of the real request.
 */

export class Example {
  readonly inputs: Readonly<Record<string, unknown>>;
  readonly outputs: Readonly<Record<string, unknown>>;
  /** Human-readable label, shown nowhere in prompts. */
  readonly label?: string;

  constructor(
    inputs: Record<string, unknown>,
    outputs: Record<string, unknown> = {},
    label?: string,
  ) {
    this.inputs = Object.freeze({ ...inputs });
    this.outputs = Object.freeze({ ...outputs });
    this.label = label;
  }

  /** Copy with `inputs` merged over the existing inputs. */
  withInputs(inputs: Record<string, unknown>): Example {
    return new Example({ ...this.inputs, ...inputs }, { ...this.outputs }, this.label);
  }

  /** Copy with `outputs` merged over the existing outputs. */
  withOutputs(outputs: Record<string, unknown>): Example {
    return new Example({ ...this.inputs }, { ...this.outputs, ...outputs }, this.label);
  }

  withLabel(label: string): Example {
    return new Example({ ...this.inputs }, { ...this.outputs }, label);
  }
}
