#!/usr/bin/env node
import fs from 'node:fs';
import chalk from 'chalk';
import { Command } from 'commander';
import { CodecStatus } from './ballots';
import { resolveBallot, VoteMode } from './config';
import { createLogger } from './logger';
import { describeEqualVotes, summarize } from './report';
import {
    evaluateVotes,
    findOwnVote,
    parseResultRecord,
    parseVotes,
    recordBallot,
    ResultRecord,
    resultHash,
    verifyResultRecord,
    VerifyStatus,
} from './result';
import { loadSettings } from './settings';
import { countEqualVotes } from './statistics';

const settings = loadSettings();
const log = createLogger(settings.logLevel, settings.prettyLogs).child({ module: 'cli' });

function readRecord(file: string): { record: ResultRecord; hash: string } {
    const text = fs.readFileSync(file, 'utf8');
    return { record: parseResultRecord(text), hash: resultHash(text) };
}

function fail(subject: string, err: unknown) {
    process.exitCode = 1;
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`${subject}: ${message}`));
}

const program = new Command();

program
    .name('assembly-tally')
    .description('Verify and evaluate published assembly ballot results')
    .version('0.1.0');

program
    .command('verify-result')
    .description('Recompute result files from the votes they publish')
    .argument('<files...>', 'published result files')
    .option('--votes', 'list how often each distinct vote was cast')
    .action((files: string[], opts: { votes?: boolean }) => {
        for (const file of files) {
            try {
                const { record, hash } = readRecord(file);
                console.log(chalk.bold(`${file} (${record.ballotId})`));
                console.log(chalk.dim(`  SHA-512: ${hash}`));

                const outcome = verifyResultRecord(record);
                const { set } = recordBallot(record);
                if (outcome.status === VerifyStatus.Verified) {
                    console.log(chalk.green('  Result verified'));
                    for (const line of summarize(record, set)) console.log(`  ${line}`);
                    if (opts.votes) {
                        console.log('  Votes:');
                        const votes = record.votes.map(v => v.vote);
                        for (const line of describeEqualVotes(countEqualVotes(votes, record.mode))) {
                            console.log(`  ${line}`);
                        }
                    }
                } else if (outcome.status === VerifyStatus.InvalidVote) {
                    process.exitCode = 1;
                    console.log(chalk.red(`  Invalid vote ${outcome.vote} (${outcome.reason})`));
                } else {
                    process.exitCode = 1;
                    console.log(chalk.red(`  Published ${outcome.fields.join(', ')} do not match the votes`));
                    console.log(chalk.red(`  Expected result ${outcome.expected}, published ${record.result}`));
                }
                log.debug({ ballotId: record.ballotId, status: outcome.status }, 'record checked');
            } catch (err) {
                fail(file, err);
            }
        }
    });

program
    .command('verify-vote')
    .description('Find your own vote in result files by its receipt secret')
    .argument('<secret>', 'the secret received when voting')
    .argument('<files...>', 'published result files')
    .action((secret: string, files: string[]) => {
        for (const file of files) {
            try {
                const { record } = readRecord(file);
                const own = findOwnVote(record, secret);
                if (own) {
                    console.log(`${chalk.bold(record.ballotId)}: you voted ${chalk.cyan(own.vote)}`);
                } else {
                    console.log(`${chalk.bold(record.ballotId)}: ${chalk.yellow('no vote found for this secret')}`);
                }
            } catch (err) {
                fail(file, err);
            }
        }
    });

program
    .command('evaluate')
    .description('Rank ad hoc vote strings with the Schulze method')
    .requiredOption('--candidates <tokens>', 'comma separated candidate tokens')
    .option('--bar', 'add the rejection option _bar_')
    .option('--classical <n>', 'treat votes as classical with n selectable candidates', value => Number(value))
    .argument('[votes...]', 'vote strings like A=B>C')
    .action((votes: string[], opts: { candidates: string; bar?: boolean; classical?: number }) => {
        try {
            const ballot = resolveBallot({
                candidates: opts.candidates.split(',').map(token => ({ token: token.trim() })),
                useBar: opts.bar ?? false,
                mode: opts.classical === undefined ? VoteMode.Preferential : VoteMode.Classical,
                numVotes: opts.classical,
            });

            const parsed = parseVotes(votes.map(vote => ({ vote })), ballot);
            if (parsed.status !== CodecStatus.Accepted) {
                fail(parsed.vote, new Error(`invalid vote (${parsed.reason})`));
                return;
            }
            for (const line of summarize(evaluateVotes(ballot, parsed.partitions), ballot.set)) {
                console.log(line);
            }
        } catch (err) {
            fail('evaluate', err);
        }
    });

program.parse();
