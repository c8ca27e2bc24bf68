import { kmergeMin } from "../kmerge";

const left = [1, 2, 5, 8];
const right = [3, 4, 6, 7];

log(kmergeMin([left, right], {
  queueMicrotask: callback => setTimeout(callback, 100)
})).catch(console.error);

async function log(merged: AsyncIterable<number>) {
  const result: number[] = [];
  for await (const value of merged) {
    result.push(value);
  }
  console.log(JSON.stringify(result, undefined, "  "));
}
