import { Stack } from '../src/stack';
import test from 'ava';

test('stack push and pop', t => {
  const s = new Stack<number>();
  t.is(s.pop(), undefined);
  t.is(s.length, 0);
  s.push(1);
  t.is(s.length, 1);
  t.is(s.peek(), 1);
  t.is(s.pop(), 1);
  t.is(s.length, 0);
  t.is(s.pop(), undefined);
  t.is(s.peek(), undefined);
});

test('stack pops objects in reverse order', t => {
  const s = new Stack<{ id: number; label: string }>();
  for (let i = 1; i < 10; ++i) {
    s.push({ id: i, label: String(i) });
    t.is(s.length, i);
  }
  for (let i = 9; i >= 1; --i) {
    t.deepEqual(s.pop(), { id: i, label: String(i) });
    t.is(s.length, i - 1);
  }
});

test('iterating drains the stack', t => {
  const s = new Stack<string>();
  for (let i = 0; i < 5; ++i) {
    s.push(String(i));
  }
  t.deepEqual([...s], ['4', '3', '2', '1', '0']);
  t.is(s.length, 0);
  t.is(s.pop(), undefined);
});

test('stack large size, clear', t => {
  const TEST_SIZE = 1000000;
  const s = new Stack<number>();
  for (let i = 0; i < TEST_SIZE; ++i) {
    s.push(i);
  }
  t.is(s.length, TEST_SIZE);
  s.clear();
  t.is(s.length, 0);
  t.is(s.peek(), undefined);
  s.push(7);
  t.is(s.pop(), 7);
});
