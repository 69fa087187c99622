import { fileURLToPath } from "node:url";
import { rowseal } from "../src";

// One file, sealed at rest. Equality lookups still work because encoding is deterministic.
const sqlitePath = fileURLToPath(new URL("./minimal.sqlite", import.meta.url));
const db = rowseal.open({
  path: sqlitePath,
  mode: "sealed",
  secret: process.env.ROWSEAL_SECRET ?? "example-secret",
});

db.table("cars", "id INTEGER", "make TEXT", "model TEXT", "electric BOOLEAN", "registered DATETIME");

db.add(
  [
    { id: 1, make: "Citroen", model: "C4", electric: false, registered: new Date("2021-03-01") },
    { id: 2, make: "Citroen", model: "e-C4", electric: true, registered: new Date("2023-06-15") },
  ],
  "cars",
);

const { ALL } = rowseal.FetchMode;

const citroens = db.fetch({ make: "Citroen" }, "cars", ALL);
console.log(citroens.value);

db.update({ id: 1 }, { electric: true }, "cars");
console.log(db.fetch({ electric: true }, "cars", ALL).length);

db.remove({ make: "Citroen" }, "cars");
console.log(String(db.table("cars")));
db.dropTable("cars");
