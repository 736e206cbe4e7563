import assert from 'assert';
import { after, before, describe, test } from 'node:test';
import type { FormActions, SubmitOrAdvanceOutcome } from '../types/capabilities';
import type { ApplicantProfile } from '../types/domain';
import { FakeForm, StubCapability, configureTestEnv, textField } from './helpers';

configureTestEnv();

let db: typeof import('../db');
let forms: typeof import('../forms/formStateMachine');

const profile: ApplicantProfile = {
    first_name: 'Ada',
    last_name: 'Lovelace',
    email: 'ada@example.com',
    phone: '5550100',
    phone_country_code: '+44',
    city: 'London',
    country: 'United Kingdom',
    linkedin_url: '',
    website: '',
    resume_path: '',
    expected_salary: '',
    summary: '',
    years_of_experience: { rust: 4 },
    answers: {},
};

class SubmitOnAdvanceForm extends FakeForm {
    override async listFormActions(): Promise<FormActions> {
        return { advance: !this.submitted, submit: false };
    }

    override async submitOrAdvance(): Promise<SubmitOrAdvanceOutcome> {
        this.submitted = true;
        return 'submitted';
    }
}

before(async () => {
    db = await import('../db');
    forms = await import('../forms/formStateMachine');
    await db.initDatabase();
});

after(async () => {
    await db.closeDatabase();
});

describe('FormCompletionStateMachine', () => {
    test('fills and submits a two-step form', async () => {
        const form = new FakeForm([
            { fields: [textField('first', 'First name'), textField('mail', 'Email address', { inputType: 'email' })] },
            {
                fields: [
                    textField('auth', 'Are you authorized to work?', {
                        tagName: 'select',
                        inputType: null,
                        options: ['Select an option', 'Yes', 'No'],
                    }),
                ],
            },
        ]);
        const capability = new StubCapability();
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability, maxFillAttempts: 3 });

        const result = await machine.run();

        assert.equal(result.state, 'Completed');
        assert.equal(result.reason, null);
        assert.equal(result.steps, 2);
        assert.equal(form.submitted, true);
        assert.deepEqual(form.writes, [
            { fieldId: 'first', value: 'Ada' },
            { fieldId: 'mail', value: 'ada@example.com' },
            { fieldId: 'auth', value: 'Yes' },
        ]);
        assert.deepEqual(result.answers, {
            'First name': 'Ada',
            'Email address': 'ada@example.com',
            'Are you authorized to work?': 'Yes',
        });
        assert.equal(capability.classifyCalls, 0);
        assert.equal(capability.generateCalls, 0);
        assert.deepEqual(
            result.transitions.map((t) => t.to),
            ['Analyzing', 'Filling', 'Validating', 'Advancing', 'Analyzing', 'Filling', 'Validating', 'Submitting', 'Completed']
        );
    });

    test('walks profile, inferred and generated values before giving up on a field', async () => {
        const form = new FakeForm([
            {
                fields: [textField('years', 'How many years of experience with Rust?', { inputType: 'number' })],
                validate: { years: () => 'Enter a whole number between 5 and 30' },
            },
        ]);
        const capability = new StubCapability(undefined, async () => '3');
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability, maxFillAttempts: 3 });

        const result = await machine.run();

        assert.equal(result.state, 'Failed');
        assert.equal(result.reason, 'unfillable_field');
        assert.deepEqual(form.writes.map((w) => w.value), ['4', '0', '3']);
        assert.equal(capability.generateCalls, 1);
        assert.equal(form.submitted, false);
    });

    test('an optional field that stays flagged ends the run instead of refilling forever', async () => {
        const form = new FakeForm([
            { fields: [textField('nick', 'Nickname', { required: false, validationError: 'Invalid value' })] },
        ]);
        let reads = 0;
        const listVisibleFields = form.listVisibleFields.bind(form);
        form.listVisibleFields = async () => {
            reads += 1;
            return listVisibleFields();
        };
        const capability = new StubCapability(undefined, async () => 'Ace');
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability, maxFillAttempts: 3 });

        const result = await machine.run();

        assert.equal(result.state, 'Failed');
        assert.equal(result.reason, 'unfillable_field');
        assert.deepEqual(form.writes, [{ fieldId: 'nick', value: 'Ace' }]);
        assert.equal(capability.generateCalls, 1);
        assert.equal(reads, 2);
    });

    test('an advance action that submits the form still passes through Submitting', async () => {
        const form = new SubmitOnAdvanceForm([{ fields: [textField('first', 'First name')] }]);
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability: new StubCapability() });

        const result = await machine.run();

        assert.equal(result.state, 'Completed');
        assert.deepEqual(
            result.transitions.map((t) => t.to),
            ['Analyzing', 'Filling', 'Validating', 'Advancing', 'Submitting', 'Completed']
        );
    });

    test('a required field of unrecognized type fails as unsupported', async () => {
        const form = new FakeForm([
            { fields: [textField('widget', 'Pick a slot', { tagName: 'div', inputType: null })] },
        ]);
        const capability = new StubCapability(async () => 'calendar');
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability });

        const result = await machine.run();

        assert.equal(result.state, 'Failed');
        assert.equal(result.reason, 'unsupported_field');
        assert.equal(capability.classifyCalls, 1);
        assert.deepEqual(form.writes, []);
    });

    test('a required upload without a document fails as unsupported', async () => {
        const form = new FakeForm([
            { fields: [textField('cv', 'Upload resume', { inputType: 'file' })] },
        ]);
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability: new StubCapability() });

        const result = await machine.run();

        assert.equal(result.reason, 'unsupported_field');
    });

    test('stops once the step limit is exceeded', async () => {
        const form = new FakeForm([
            { fields: [textField('first', 'First name')] },
            { fields: [textField('last', 'Last name')] },
        ]);
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability: new StubCapability(), maxSteps: 1 });

        const result = await machine.run();

        assert.equal(result.state, 'Failed');
        assert.equal(result.reason, 'step_limit_exceeded');
        assert.equal(result.steps, 2);
        assert.deepEqual(form.writes, [{ fieldId: 'first', value: 'Ada' }]);
    });

    test('an aborted signal ends the run as cancelled', async () => {
        const form = new FakeForm([{ fields: [textField('first', 'First name')] }]);
        const controller = new AbortController();
        controller.abort();
        const machine = new forms.FormCompletionStateMachine(form, {
            profile,
            capability: new StubCapability(),
            url: 'https://www.linkedin.com/jobs/view/1/',
            signal: controller.signal,
        });

        const result = await machine.run();

        assert.equal(result.state, 'Failed');
        assert.equal(result.reason, 'cancelled');
        assert.equal(form.navigatedTo, null);
    });

    test('an instance runs only once', async () => {
        const form = new FakeForm([{ fields: [textField('first', 'First name')] }]);
        const machine = new forms.FormCompletionStateMachine(form, { profile, capability: new StubCapability() });
        await machine.run();
        await assert.rejects(() => machine.run(), /single-use/);
    });
});
