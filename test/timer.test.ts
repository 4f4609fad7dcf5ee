import { Timer } from '../lib/timer.class.js';

const label = 'timer:';

/**
 * Test the stopwatch / countdown, against a clock the test controls
 */
describe(`${label}`, () => {
  let now = 100;
  const clock = () => now;

  beforeEach(() => {
    now = 100;
  })

  test(`${label} never started`, () => {
    const timer = new Timer({ clock });

    expect([timer.started(), timer.stopped(), timer.elapsed()]).toEqual([false, true, 0]);
  })

  test(`${label} elapsed time while running`, () => {
    const timer = new Timer({ clock }).start();
    now = 105;

    expect(timer.started()).toBe(true);
    expect(timer.elapsed()).toBe(5);
  })

  test(`${label} a stopped timer holds its time`, () => {
    const timer = new Timer({ clock }).start();
    now = 105;
    timer.stop();
    now = 110;

    expect(timer.stopped()).toBe(true);
    expect(timer.elapsed()).toBe(5);
  })

  test(`${label} start after stop resumes`, () => {
    const timer = new Timer({ clock }).start();
    now = 105;
    timer.stop();
    now = 110;
    timer.start();
    now = 112;

    expect(timer.elapsed()).toBe(7);
  })

  test(`${label} start while running restarts`, () => {
    const timer = new Timer({ clock }).start();
    now = 105;
    timer.start();
    now = 106;

    expect(timer.elapsed()).toBe(1);
  })

  test(`${label} reset`, () => {
    const timer = new Timer({ clock }).start();
    now = 105;

    expect(timer.reset().elapsed()).toBe(0);
    expect(timer.started()).toBe(false);
  })

  test(`${label} countdown`, () => {
    const timer = new Timer({ clock, timeout: 10 }).start();
    now = 104;

    expect([timer.remaining(), timer.done()]).toEqual([6, false]);

    now = 111;
    expect([timer.remaining(), timer.done()]).toEqual([-1, true]);
  })

  test(`${label} time a function`, () => {
    const { timer, result } = Timer.time(() => {
      now += 3;
      return 'finished';
    }, { clock })

    expect(result).toBe('finished');
    expect(timer.stopped()).toBe(true);
    expect(timer.elapsed()).toBe(3);
  })

  test(`${label} the timer stops when the function throws`, () => {
    const seen: Timer[] = [];

    expect(() => Timer.time(timer => {
      seen.push(timer);
      now += 2;
      throw new Error('test failure');
    }, { clock })).toThrow('test failure');

    expect(seen).toHaveLength(1);
    expect(seen[0].stopped()).toBe(true);
    expect(seen[0].elapsed()).toBe(2);
  })

  test(`${label} the wall clock`, () => {
    const timer = new Timer().start();

    expect(timer.elapsed()).toBeGreaterThanOrEqual(0);
    expect(Object.prototype.toString.call(timer)).toBe('[object Timer]');
  })
})
