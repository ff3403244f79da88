import { vi } from "vitest";

// `server-only` throws outside a React Server bundle; route handlers and lib code are plain Node here.
vi.mock("server-only", () => ({}));
