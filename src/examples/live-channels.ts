import { kmergeBy } from "../kmerge";
import { coalesce } from "../coalesce";

interface Reading {
  channel: string;
  at: number;
  count: number;
}

async function wait(maxInterval = 250) {
  const waitTime = Math.round(Math.random() * maxInterval);
  await new Promise(resolve => setTimeout(resolve, waitTime));
}

async function *channel(name: string, maxCount = 5): AsyncIterable<Reading> {
  let at = 0;
  let remaining = 1 + Math.floor(Math.random() * maxCount);
  do {
    remaining -= 1;
    await wait();
    at += 1 + Math.floor(Math.random() * 3);
    yield { channel: name, at, count: 1 };
  } while (remaining > 0);
}

async function run() {
  const merged = kmergeBy(
    [channel("primary"), channel("secondary"), channel("tertiary")],
    (a, b) => a.at < b.at
  );
  // One line per instant, however many channels reported in it
  const perInstant = coalesce(merged, (previous, current) => (
    previous.at === current.at ?
      { merged: true, value: { channel: `${previous.channel}+${current.channel}`, at: current.at, count: previous.count + current.count } } :
      { merged: false }
  ));
  for await (const reading of perInstant) {
    console.log(reading);
  }
}

await run();
