import { test } from "tap";
import { Reference, unquote, type ReferenceInit } from "../src/refs/reference.js";
import { lazy, literal, type ParseContext } from "../src/refs/resolver.js";
import { collectionInfo } from "../src/schema/collection.js";
import { COMPUTE_V1, SVC_V1, widgets } from "./fixtures.js";

const widgetInfo = collectionInfo("svc", "v1", widgets);

function makeRef(overrides: Partial<ReferenceInit> & { values: Array<string | undefined> }): Reference {
  return new Reference({
    info: widgetInfo,
    context: {},
    baseUrl: SVC_V1,
    defaults: () => undefined,
    unquoteLink: false,
    ...overrides,
  });
}

test("weakResolve: fills from context", (t) => {
  const ref = makeRef({ values: [undefined, "w"], context: { project: "ctx-proj" } });

  ref.weakResolve();

  t.equal(ref.get("project"), "ctx-proj");
  t.equal(ref.weakSelfLink(), "https://svc.googleapis.com/v1/projects/ctx-proj/widgets/w");

  t.end();
});

test("weakResolve: context beats defaults", (t) => {
  const ref = makeRef({
    values: [undefined, "w"],
    context: { project: literal("ctx-proj") },
    defaults: () => "default-proj",
  });

  ref.weakResolve();

  t.equal(ref.get("project"), "ctx-proj");

  t.end();
});

test("weakResolve: falls back to defaults when context yields nothing", (t) => {
  const ref = makeRef({
    values: [undefined, "w"],
    context: { project: lazy(() => undefined) },
    defaults: (param) => (param === "project" ? "default-proj" : undefined),
  });

  ref.weakResolve();

  t.equal(ref.get("project"), "default-proj");

  t.end();
});

test("weakResolve: never overwrites supplied fields", (t) => {
  const ref = makeRef({
    values: ["path-proj", "w"],
    context: { project: "ctx-proj" },
    defaults: () => "default-proj",
  });

  ref.weakResolve();

  t.equal(ref.get("project"), "path-proj");

  t.end();
});

test("weakResolve: never throws and leaves a wildcard link", (t) => {
  const ref = makeRef({ values: [undefined, "w"] });

  ref.weakResolve();

  t.equal(ref.get("project"), undefined);
  t.equal(ref.weakSelfLink(), "https://svc.googleapis.com/v1/projects/*/widgets/w");

  t.end();
});

test("weakResolve: is idempotent", (t) => {
  let calls = 0;
  const context: ParseContext = {
    project: lazy(() => {
      calls++;
      return `proj-${String(calls)}`;
    }),
  };
  const ref = makeRef({ values: [undefined, "w"], context });

  ref.weakResolve();
  const first = { params: ref.params(), link: ref.weakSelfLink() };
  ref.weakResolve();

  t.same(ref.params(), first.params);
  t.equal(ref.weakSelfLink(), first.link);
  t.equal(calls, 1);

  t.end();
});

test("weakResolve: caches a context function that yields nothing", (t) => {
  let calls = 0;
  const ref = makeRef({
    values: [undefined, "w"],
    context: {
      project: lazy(() => {
        calls++;
        return undefined;
      }),
    },
  });

  ref.weakResolve();
  ref.weakResolve();

  t.equal(calls, 1);

  t.end();
});

test("weakResolve: empty string values count as missing", (t) => {
  const ref = makeRef({ values: ["", "w"], context: { project: "" }, defaults: () => "fallback" });

  ref.weakResolve();

  t.equal(ref.get("project"), "fallback");

  t.end();
});

test("resolve: reports the first missing field", (t) => {
  const gadgets = collectionInfo("svc", "v1", {
    id: "svc.projects.locations.gadgets",
    params: ["project", "location", "gadget"],
    path: "projects/{project}/locations/{location}/gadgets/{gadget}",
    baseUrl: SVC_V1,
  });
  const ref = new Reference({
    info: gadgets,
    values: [undefined, undefined, "g"],
    context: {},
    text: "g",
    baseUrl: SVC_V1,
    defaults: () => undefined,
    unquoteLink: false,
  });

  t.throws(() => ref.resolve(), {
    name: "UnknownFieldException",
    field: "project",
    message: "unknown field [project] in [g]",
  });

  t.end();
});

test("name: returns the terminal value", (t) => {
  const ref = makeRef({ values: ["p", "mywidget"] });

  t.equal(ref.name(), "mywidget");

  t.end();
});

test("name: throws when an ancestor is unknown", (t) => {
  const ref = makeRef({ values: [undefined, "mywidget"], text: "mywidget" });

  t.throws(() => ref.name(), { name: "UnknownFieldException", field: "project" });

  t.end();
});

test("selfLink: percent-encodes values", (t) => {
  const ref = makeRef({ values: ["p", "a/b c"] });

  t.equal(ref.selfLink(), "https://svc.googleapis.com/v1/projects/p/widgets/a%2Fb%20c");

  t.end();
});

test("selfLink: legacy collections are percent-decoded", (t) => {
  const info = collectionInfo("compute", "v1", {
    id: "compute.instances",
    params: ["project", "zone", "instance"],
    path: "projects/{project}/zones/{zone}/instances/{instance}",
    baseUrl: COMPUTE_V1,
  });
  const ref = new Reference({
    info,
    values: ["p", "z", "my vm"],
    context: {},
    baseUrl: COMPUTE_V1,
    defaults: () => undefined,
    unquoteLink: true,
  });

  t.equal(ref.selfLink(), "https://www.googleapis.com/compute/v1/projects/p/zones/z/instances/my vm");

  t.end();
});

test("equals and toString compare self-links", (t) => {
  const a = makeRef({ values: ["p", "w"] });
  const b = makeRef({ values: [undefined, "w"], context: { project: "p" } });
  const c = makeRef({ values: ["p", "other"] });

  t.ok(a.equals(b));
  t.notOk(a.equals(c));
  t.equal(`${a}`, "https://svc.googleapis.com/v1/projects/p/widgets/w");

  t.end();
});

test("accessors", (t) => {
  const ref = makeRef({ values: ["p", "w"] });

  t.equal(ref.collection(), "svc.projects.widgets");
  t.same(ref.api(), { name: "svc", version: "v1" });
  t.same(ref.paramNames(), ["project", "widget"]);
  t.equal(ref.baseUrl, SVC_V1);

  t.end();
});

test("unquote: leaves invalid escapes alone", (t) => {
  t.equal(unquote("a%2Fb"), "a/b");
  t.equal(unquote("100%"), "100%");

  t.end();
});
