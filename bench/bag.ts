import { Bag } from '../src/index';
import type { Token } from '../src/index';

// Usage: tsx bench/bag.ts --n=100000

function measure<T>(label: string, fn: () => T): T {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

const args = process.argv.slice(2);
const countArg = args.find(arg => arg.startsWith('--n='));
const parsedCount = countArg ? Number(countArg.split('=')[1]) : 100_000;
const N = Number.isInteger(parsedCount) && parsedCount > 0 ? parsedCount : 100_000;

console.log(`=== Bag Benchmark (N = ${N}) ===\n`);

const bag = new Bag<number>();
const tokens: Token[] = measure(`insert ${N}`, () => {
    const out: Token[] = [];
    for (let i = 0; i < N; i++) out.push(bag.insert(i));
    return out;
});

// Teardown in reverse: every removal hits the recent window.
measure(`remove ${N} newest-first`, () => {
    for (let i = N - 1; i >= 0; i--) bag.remove(tokens[i]);
});

const again = new Bag<number>();
const oldFirst: Token[] = [];
for (let i = 0; i < N; i++) oldFirst.push(again.insert(i));

measure(`remove ${N} oldest-first`, () => {
    for (let i = 0; i < N; i++) again.remove(oldFirst[i]);
});

const iterated = new Bag<number>();
for (let i = 0; i < N; i++) iterated.insert(i);
measure(`iterate ${N}`, () => {
    let sum = 0;
    for (const value of iterated) sum += value;
    return sum;
});
