// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Termspan
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import type { SpanLike } from '../document';

/**
 * Select a subset of non-overlapping spans.
 *
 * Spans are considered longest first. Spans of equal length keep their
 * order in the input, so earlier spans win ties. A span is kept if it
 * shares no token with a span kept before it. The result is sorted by
 * start.
 *
 * This is a greedy policy: it does not maximize coverage.
 */
export default function filterSpans<S extends SpanLike>(spans : readonly S[]) : S[] {
    // Array.prototype.sort is stable
    const sorted = spans.slice().sort((a, b) => (b.end - b.start) - (a.end - a.start));

    const seen = new Set<number>();
    const result : S[] = [];
    for (const span of sorted) {
        let free = true;
        for (let i = span.start; i < span.end && free; i++)
            free = !seen.has(i);
        if (!free)
            continue;
        for (let i = span.start; i < span.end; i++)
            seen.add(i);
        result.push(span);
    }

    return result.sort((a, b) => a.start - b.start);
}
