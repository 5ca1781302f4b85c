import { type Rng, assert, createRng, describe, test } from "@boxflow/testkit";
import { fixedChild } from "../../testing/index.js";
import { centerIndexOf, layoutCentered } from "../kinds/centered.js";
import { computeFlowRows, layoutFlowWrap, measureFlowWrap } from "../kinds/flowWrap.js";
import type { FlowWrapProps, LayoutChild, Size } from "../types.js";

const ITERATIONS = 200;

function pick(rng: Rng, maxExclusive: number): number {
  return rng.u32() % maxExclusive;
}

type Case = Readonly<{
  sizes: readonly Size[];
  children: readonly LayoutChild[];
  maxW: number;
  props: Readonly<{ horizontalSpacing: number; verticalSpacing: number; maxRows?: number }>;
}>;

function randomCase(rng: Rng): Case {
  const count = pick(rng, 13);
  const sizes: Size[] = [];
  const children: LayoutChild[] = [];
  for (let i = 0; i < count; i++) {
    const size = { w: pick(rng, 100), h: 1 + pick(rng, 40) };
    sizes.push(size);
    children.push(fixedChild(size.w, size.h, { breakAfter: pick(rng, 8) === 0 }));
  }
  const maxRowsRoll = pick(rng, 5);
  return {
    sizes,
    children,
    maxW: pick(rng, 301),
    props: {
      horizontalSpacing: pick(rng, 11),
      verticalSpacing: pick(rng, 11),
      ...(maxRowsRoll === 0 ? {} : { maxRows: maxRowsRoll }),
    },
  };
}

describe("flowWrap properties", () => {
  test("rows partition children in order and respect the width", () => {
    const rng = createRng(0xb0f1);
    for (let iter = 0; iter < ITERATIONS; iter++) {
      const c = randomCase(rng);
      const props: FlowWrapProps = c.props;
      const res = computeFlowRows(c.children, c.maxW, props);
      if (!res.ok) assert.fail(`iteration ${String(iter)}: ${res.fatal.detail}`);
      const rows = res.value;

      const flat = rows.flatMap((row) => [...row.indices]);
      assert.deepEqual(
        flat,
        c.sizes.map((_, i) => i),
        `iteration ${String(iter)}: rows must cover every child once, in order`,
      );

      if (c.props.maxRows !== undefined) {
        assert.ok(rows.length <= c.props.maxRows, `iteration ${String(iter)}: too many rows`);
      }

      for (let r = 0; r < rows.length; r++) {
        const row = rows[r];
        if (!row) continue;
        assert.ok(row.indices.length > 0, `iteration ${String(iter)}: empty row`);

        let h = 0;
        let w = 0;
        for (let k = 0; k < row.indices.length; k++) {
          const size = c.sizes[row.indices[k] ?? -1];
          if (!size) assert.fail("row references a missing child");
          if (size.h > h) h = size.h;
          w += size.w + (k > 0 ? c.props.horizontalSpacing : 0);
        }
        assert.equal(row.h, h, `iteration ${String(iter)}: row ${String(r)} height`);
        assert.equal(row.w, w, `iteration ${String(iter)}: row ${String(r)} width`);

        const cappedLast = c.props.maxRows !== undefined && r === c.props.maxRows - 1;
        if (!cappedLast && row.indices.length > 1) {
          assert.ok(row.w <= c.maxW, `iteration ${String(iter)}: row ${String(r)} overflows`);
        }
      }
    }
  });

  test("layout places every child once at its own size inside its row", () => {
    const rng = createRng(0x5eed);
    for (let iter = 0; iter < ITERATIONS; iter++) {
      const c = randomCase(rng);
      const bounds = { x: pick(rng, 50), y: pick(rng, 50), w: c.maxW, h: 500 };
      const res = layoutFlowWrap(c.children, bounds, c.props);
      if (!res.ok) assert.fail(`iteration ${String(iter)}: ${res.fatal.detail}`);

      assert.deepEqual(
        res.value.map((p) => p.index),
        c.sizes.map((_, i) => i),
      );
      for (const p of res.value) {
        const size = c.sizes[p.index];
        if (!size) assert.fail("placement references a missing child");
        assert.equal(p.rect.w, size.w);
        assert.equal(p.rect.h, size.h);
        assert.ok(p.rect.x >= bounds.x);
        assert.ok(p.rect.y >= bounds.y);
      }

      const measured = measureFlowWrap(c.children, c.maxW, c.props);
      if (!measured.ok) assert.fail(measured.fatal.detail);
      const bottom = res.value.reduce((m, p) => Math.max(m, p.rect.y + p.rect.h), bounds.y);
      assert.equal(bottom - bounds.y, measured.value.h, `iteration ${String(iter)}: height`);
    }
  });

  test("identical inputs give identical placements", () => {
    const rng = createRng(7);
    for (let iter = 0; iter < 20; iter++) {
      const c = randomCase(rng);
      const bounds = { x: 0, y: 0, w: c.maxW, h: 100 };
      assert.deepEqual(
        layoutFlowWrap(c.children, bounds, c.props),
        layoutFlowWrap(c.children, bounds, c.props),
      );
    }
  });
});

describe("centered properties", () => {
  test("the center child sits on the container midpoint", () => {
    const rng = createRng(0xce47);
    for (let iter = 0; iter < ITERATIONS; iter++) {
      const c = randomCase(rng);
      if (c.children.length === 0) continue;
      const bounds = { x: pick(rng, 100), y: pick(rng, 100), w: pick(rng, 400), h: pick(rng, 60) };
      const res = layoutCentered(c.children, bounds, { spacing: c.props.horizontalSpacing });
      if (!res.ok) assert.fail(`iteration ${String(iter)}: ${res.fatal.detail}`);

      assert.equal(res.value.length, c.children.length);
      const centerIndex = centerIndexOf(c.children.length);
      const center = res.value[centerIndex];
      const size = c.sizes[centerIndex];
      if (!center || !size) assert.fail("center placement missing");

      assert.equal(center.index, centerIndex);
      assert.equal(center.rect.w, size.w);
      assert.equal(center.rect.h, size.h);
      assert.equal(center.rect.x + center.rect.w / 2, bounds.x + bounds.w / 2);
      assert.equal(center.rect.y + center.rect.h / 2, bounds.y + bounds.h / 2);
    }
  });

  test("left children start at the leading edge and right children end at the trailing edge", () => {
    const rng = createRng(99);
    for (let iter = 0; iter < ITERATIONS; iter++) {
      const c = randomCase(rng);
      if (c.children.length < 3) continue;
      const bounds = { x: 10, y: 0, w: 400, h: 40 };
      const res = layoutCentered(c.children, bounds, { spacing: 4 });
      if (!res.ok) assert.fail(`iteration ${String(iter)}: ${res.fatal.detail}`);
      const first = res.value[0];
      const last = res.value[res.value.length - 1];
      if (!first || !last) assert.fail("side placements missing");
      assert.equal(first.rect.x, 10);
      assert.equal(last.rect.x + last.rect.w, 410);
    }
  });
});
