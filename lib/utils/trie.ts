// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2019 The Board of Trustees of the Leland Stanford Junior University
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
//
// Author: Giovanni Campagna <gcampagn@cs.stanford.edu>

class TrieNode<K, V, VCombined> {
    private _valueCombine : (one : VCombined|undefined, two : V) => VCombined;
    value : VCombined|undefined;
    children : Map<K, TrieNode<K, V, VCombined>>;

    constructor(valueCombine : (one : VCombined|undefined, two : V) => VCombined) {
        this._valueCombine = valueCombine;
        this.value = undefined;
        this.children = new Map;
    }

    addValue(value : V) {
        this.value = this._valueCombine(this.value, value);
    }

    addChild(key : K) : TrieNode<K, V, VCombined> {
        const child = new TrieNode<K, V, VCombined>(this._valueCombine);
        this.children.set(key, child);
        return child;
    }

    getChild(key : K) {
        return this.children.get(key);
    }
}

/**
  A simple Trie-based key-value store over sequences.

  Besides exact lookups, the trie can enumerate every stored sequence that
  occurs at a given position of a longer sequence, which is what phrase
  matching needs.
*/
export default class Trie<K, V, VCombined> {
    root : TrieNode<K, V, VCombined>;

    constructor(valueCombine : (one : VCombined|undefined, two : V) => VCombined) {
        this.root = new TrieNode(valueCombine);
    }

    insert(sequence : readonly K[], value : V) {
        let node = this.root;
        for (const key of sequence) {
            let child = node.getChild(key);
            if (!child)
                child = node.addChild(key);
            node = child;
        }
        node.addValue(value);
    }

    search(sequence : readonly K[]) : VCombined|undefined {
        let node = this.root;
        for (const key of sequence) {
            const child = node.getChild(key);
            if (!child)
                return undefined;
            node = child;
        }
        return node.value;
    }

    /**
      Walk the trie along `sequence` starting at `start`, and yield the end
      index (exclusive) and the value of every stored sequence found on the way,
      shortest first.

      The walk never reads past `end`.
    */
    *prefixes(sequence : readonly K[], start : number, end = sequence.length) : Generator<[number, VCombined]> {
        let node = this.root;
        for (let i = start; i < end; i++) {
            const child = node.getChild(sequence[i]);
            if (!child)
                return;
            node = child;
            if (node.value !== undefined)
                yield [i+1, node.value];
        }
    }
}
