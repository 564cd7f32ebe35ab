import { describe, expect, it } from 'vitest';
import { applyAspects, type Aspect } from './applyAspects.js';

interface Req {
  value: string;
}

interface Res {
  result: string;
  trail: string[];
}

const base = async (req: Req): Promise<Res> => ({ result: req.value, trail: ['base'] });

const tag =
  (name: string): Aspect<Req, Res> =>
  async (req, next) => {
    const response = await next(req);
    return { ...response, trail: [...response.trail, name] };
  };

describe('applyAspects', () => {
  it('calls the base function when there are no aspects', async () => {
    const wrapped = applyAspects(base, []);

    await expect(wrapped({ value: 'x' })).resolves.toEqual({ result: 'x', trail: ['base'] });
  });

  it('treats the first aspect as the outermost wrapper', async () => {
    const wrapped = applyAspects(base, [tag('outer'), tag('middle'), tag('inner')]);
    const result = await wrapped({ value: 'x' });

    expect(result.trail).toEqual(['base', 'inner', 'middle', 'outer']);
  });

  it('lets an aspect rewrite the request', async () => {
    const upper: Aspect<Req, Res> = async (req, next) => next({ value: req.value.toUpperCase() });
    const wrapped = applyAspects(base, [upper]);

    expect((await wrapped({ value: 'phi' })).result).toBe('PHI');
  });

  it('propagates errors from the base function', async () => {
    const failing = async (_req: Req): Promise<Res> => {
      throw new Error('base failed');
    };
    const wrapped = applyAspects(failing, [tag('outer')]);

    await expect(wrapped({ value: 'x' })).rejects.toThrow('base failed');
  });
});
