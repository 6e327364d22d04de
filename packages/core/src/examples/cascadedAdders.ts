import { Algorithm, port } from "../algorithm";
import { Variable } from "../variable";

interface AdderInputs {
  a: number;
  b: number;
}

interface AdderOutputs {
  c: number;
}

export class Adder extends Algorithm<AdderInputs, AdderOutputs> {
  constructor(readonly name: string) {
    super(
      {
        inputs: { a: port(0), b: port(0) },
        outputs: { c: port(0) },
      },
      { enabled: false }
    );
    this.enabled.set(true);
  }

  update() {
    this.outputs.c.set(this.inputs.a.get() + this.inputs.b.get());
  }
}

/**
 * Two cascaded adders fed by three input variables:
 *
 * ```
 * i1 ─┐
 *     a1 ─┐
 * i2 ─┘   a2
 * i3 ─────┘
 * ```
 */
export const createCascadedAdders = () => {
  const a1 = new Adder("a1");
  const a2 = new Adder("a2");
  const i1 = new Variable(0);
  const i2 = new Variable(0);
  const i3 = new Variable(0);

  a2.inputs.a.track(a1.outputs.c);
  a1.inputs.a.track(i1);
  a1.inputs.b.track(i2);
  a2.inputs.b.track(i3);

  return { inputs: [i1, i2, i3] as const, adders: [a1, a2] as const };
};
