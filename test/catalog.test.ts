import { test } from "tap";
import { MemoryCatalog, parseCatalog } from "../src/schema/catalog.js";
import { apiNameOf, defineCollection, expandTemplate, tokenizeTemplate } from "../src/schema/collection.js";
import { makeCatalog, SVC_V1, SVC_V2, widgets } from "./fixtures.js";

test("MemoryCatalog: default versions", (t) => {
  const catalog = makeCatalog();

  t.equal(catalog.defaultVersion("svc"), "v1");
  t.equal(catalog.defaultVersion("compute"), "v1", "a lone version is the default");
  t.equal(catalog.defaultVersion("nope"), undefined);
  t.equal(catalog.collections("svc", "v1")?.length, 3);

  t.end();
});

test("MemoryCatalog: collections", (t) => {
  const catalog = makeCatalog();

  t.same(
    catalog.collections("svc", "v2")?.map((s) => s.baseUrl),
    [SVC_V2, SVC_V2]
  );
  t.equal(catalog.collections("svc", "v9"), undefined);
  t.equal(catalog.collections("nope", "v1"), undefined);

  t.end();
});

test("MemoryCatalog: add", (t) => {
  const catalog = new MemoryCatalog();
  catalog.add("svc", "v1", [widgets]).add("svc", "v2", [{ ...widgets, baseUrl: SVC_V2 }]);

  t.equal(catalog.defaultVersion("svc"), undefined, "two versions and no default");

  catalog.add("svc", "v2", [{ ...widgets, baseUrl: SVC_V2 }], { isDefault: true });
  t.equal(catalog.defaultVersion("svc"), "v2");
  t.equal(catalog.collections("svc", "v1")?.[0]?.baseUrl, SVC_V1);

  t.end();
});

test("parseCatalog: valid definition", (t) => {
  const definition = parseCatalog({ svc: { defaultVersion: "v1", versions: { v1: [widgets] } } });

  t.same(Object.keys(definition), ["svc"]);
  t.equal(definition["svc"]?.versions["v1"]?.[0]?.id, "svc.projects.widgets");

  t.end();
});

test("parseCatalog: undefined default version", (t) => {
  t.throws(() => parseCatalog({ svc: { defaultVersion: "v2", versions: { v1: [widgets] } } }), {
    name: "MalformedSchemaException",
    message: "invalid catalog: default version [v2] of API [svc] is not defined",
  });

  t.end();
});

test("parseCatalog: malformed input", (t) => {
  t.throws(() => parseCatalog({ "bad-name": { versions: {} } }), { name: "MalformedSchemaException" });
  t.throws(() => parseCatalog({ svc: { versions: { v1: [{ ...widgets, params: [] }] } } }), {
    name: "MalformedSchemaException",
  });
  t.throws(() => MemoryCatalog.fromJSON("not a catalog"), { name: "MalformedSchemaException" });

  t.end();
});

test("parseCatalog: template checks", (t) => {
  t.throws(
    () => parseCatalog({ svc: { versions: { v1: [{ ...widgets, path: "projects/{project}/widgets" }] } } }),
    { name: "MalformedSchemaException" }
  );

  t.end();
});

test("defineCollection: rejected definitions", (t) => {
  t.throws(() => defineCollection({ ...widgets, path: "/projects/{project}/widgets/{widget}" }), {
    name: "MalformedSchemaException",
    message: "invalid collection [svc.projects.widgets]: relative path must not start with /",
  });
  t.throws(() => defineCollection({ ...widgets, baseUrl: "ftp://svc.example.com/v1/" }), {
    name: "MalformedSchemaException",
  });
  t.throws(() => defineCollection(null), {
    name: "MalformedSchemaException",
    message: /^invalid collection definition: /,
  });

  t.end();
});

test("tokenizeTemplate: placeholders must be whole, unique segments", (t) => {
  t.same(tokenizeTemplate(widgets), [
    { kind: "literal", value: "projects" },
    { kind: "param", name: "project" },
    { kind: "literal", value: "widgets" },
    { kind: "param", name: "widget" },
  ]);

  t.throws(
    () => tokenizeTemplate({ ...widgets, path: "projects/{project}/widgets/w-{widget}" }),
    { name: "MalformedSchemaException" }
  );
  t.throws(
    () =>
      tokenizeTemplate({
        ...widgets,
        params: ["project", "widget"],
        path: "projects/{project}/widgets/{project}",
      }),
    { name: "MalformedSchemaException" }
  );
  t.throws(() => tokenizeTemplate({ ...widgets, path: "projects//{project}/{widget}" }), {
    name: "MalformedSchemaException",
  });

  t.end();
});

test("expandTemplate and apiNameOf", (t) => {
  t.equal(
    expandTemplate(tokenizeTemplate(widgets), (name) => name.toUpperCase()),
    "projects/PROJECT/widgets/WIDGET"
  );
  t.equal(apiNameOf("svc.projects.widgets"), "svc");
  t.equal(apiNameOf("svc"), "svc");

  t.end();
});
