import * as fs from 'fs';
import * as path from 'path';

import {Grammar} from '../src/parsing/grammar';
import {Reader} from '../src/parsing/reader';

const kGrammarFile = path.join(__dirname, '..', 'grammars', 'bindop.fcfg');

const bindop = (): Grammar => Reader.read(fs.readFileSync(kGrammarFile, 'utf8'));

// The same grammar with a distinct predicate for each noun.
const kScopeGrammar = `
% start S
S[SEM=[CORE=<?vp(?subj)>, BO={?b1+?b2}]] -> NP[SEM=[CORE=?subj, BO=?b1]] VP[SEM=[CORE=?vp, BO=?b2]]
VP[SEM=[CORE=<?v(?obj)>, BO={?b1+?b2}]] -> TV[SEM=[CORE=?v, BO=?b1]] NP[SEM=[CORE=?obj, BO=?b2]]
NP[SEM=[CORE=<@x>, BO={<bo(?det(?n),@x)>+?b1+?b2}]] -> Det[SEM=[CORE=?det, BO=?b1]] N[SEM=[CORE=?n, BO=?b2]]
Det[SEM=[CORE=<\\Q P.exists x.(Q(x) & P(x))>, BO={/}]] -> 'a'
N[SEM=[CORE=<dog>, BO={/}]] -> 'dog'
N[SEM=[CORE=<cat>, BO={/}]] -> 'cat'
TV[SEM=[CORE=<\\x y.chase(y,x)>, BO={/}]] -> 'chases'
`;

const scope = (): Grammar => Reader.read(kScopeGrammar);

const Fixtures = {bindop, scope};

export {Fixtures};
