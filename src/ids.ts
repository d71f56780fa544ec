// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { randomBytes } from "crypto";

/** Eight hex chars. Request, run and temp-file ids. */
export const rid = () => randomBytes(4).toString("hex");
