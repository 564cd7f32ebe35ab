/**
 * Minimal aspect (middleware) composition.
 *
 * An aspect receives the request and a `next` continuation. The first aspect
 * in the list is the outermost wrapper, so its post-processing runs last.
 */
export type Aspect<Req, Res> = (req: Req, next: (req: Req) => Promise<Res>) => Promise<Res>;

export function applyAspects<Req, Res>(
  base: (req: Req) => Promise<Res>,
  aspects: Aspect<Req, Res>[]
): (req: Req) => Promise<Res> {
  return aspects.reduceRight<(req: Req) => Promise<Res>>(
    (next, aspect) => (req) => aspect(req, next),
    base
  );
}
