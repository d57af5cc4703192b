export type Probe = () => Promise<boolean>;
export type CheckState = 'ok' | 'fail' | 'disabled';

/** Probes are only passed for the backends this deployment has configured. */
export async function readinessSvc(probes: { db?: Probe; redis?: Probe }) {
  const run = async (probe?: Probe): Promise<CheckState> => {
    if (!probe) return 'disabled';
    try {
      return (await probe()) ? 'ok' : 'fail';
    } catch {
      return 'fail';
    }
  };
  const [db, redis] = await Promise.all([run(probes.db), run(probes.redis)]);
  const engine: CheckState = 'ok';
  const checks = { engine, db, redis };
  const status = db !== 'fail' && redis !== 'fail' ? 'ready' : 'not_ready';
  return { status, checks };
}
