import { BloomSet, formula, HASHES } from "./src/index.ts";

console.info(HASHES.map(formula).join(", "));

const set = new BloomSet();
for (const element of [1, 2, 3]) {
  set.add(element);
}
console.info(
  JSON.stringify(
    Object.fromEntries([1, 2, 3, 4].map((i) => [i, set.query(i)])),
    null,
    2,
  ),
);

const small = BloomSet.withSize(5);
small.add(9);
small.add(11);
console.info(`${small} -> query(16) = ${small.query(16)}`);
