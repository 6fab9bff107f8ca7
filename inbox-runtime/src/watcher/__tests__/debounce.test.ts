import test from "node:test";
import assert from "node:assert/strict";

import { PathDebouncer } from "../debounce";

const createClock = (start = 0) => {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    },
  };
};

test("1 秒以内の通知は一つにまとめる", () => {
  const clock = createClock();
  const debouncer = new PathDebouncer({ now: clock.now });

  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), true);
  clock.set(999);
  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), false);
});

test("1.1 秒離れた通知は両方受け付ける", () => {
  const clock = createClock();
  const debouncer = new PathDebouncer({ now: clock.now });

  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), true);
  clock.set(1_100);
  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), true);
});

test("捨てた通知で待ち時間は延びない", () => {
  const clock = createClock();
  const debouncer = new PathDebouncer({ now: clock.now });

  debouncer.accept("/vault/Inbox/a.txt");
  clock.set(900);
  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), false);
  clock.set(1_000);
  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), true);
});

test("パスごとに独立して間引き、古い記録は削除する", () => {
  const clock = createClock();
  const debouncer = new PathDebouncer({ now: clock.now, windowMs: 500 });

  assert.equal(debouncer.accept("/vault/Inbox/a.txt"), true);
  assert.equal(debouncer.accept("/vault/Inbox/b.txt"), true);
  assert.equal(debouncer.size, 2);

  clock.set(600);
  assert.equal(debouncer.accept("/vault/Inbox/c.txt"), true);
  assert.equal(debouncer.size, 1);
});
