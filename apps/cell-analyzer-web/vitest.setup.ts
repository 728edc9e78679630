import '@testing-library/jest-dom/vitest';
import { vi } from "vitest";

const noop = () => {};

// Some suites run in the node environment, where there is no DOM.
if (typeof HTMLAnchorElement !== "undefined") {
  Object.defineProperty(HTMLAnchorElement.prototype, "click", {
    value: vi.fn(),
  });
}

if (typeof URL.createObjectURL !== "function") {
  Object.defineProperty(URL, "createObjectURL", {
    value: () => "blob:cell-analyzer",
    configurable: true,
    writable: true,
  });
}

if (typeof URL.revokeObjectURL !== "function") {
  Object.defineProperty(URL, "revokeObjectURL", {
    value: noop,
    configurable: true,
    writable: true,
  });
}

if (!("ResizeObserver" in globalThis)) {
  class ResizeObserver {
    observe() {}
    unobserve() {}
    disconnect() {}
  }

  Object.defineProperty(globalThis, "ResizeObserver", { value: ResizeObserver });
}

if (!("matchMedia" in globalThis) || typeof globalThis.matchMedia !== "function") {
  Object.defineProperty(globalThis, "matchMedia", {
    value: (query: string) => ({
      matches: false,
      media: query,
      onchange: null,
      addListener: noop, // deprecated
      removeListener: noop, // deprecated
      addEventListener: noop,
      removeEventListener: noop,
      dispatchEvent: () => false,
    }),
    configurable: true,
  });
}
