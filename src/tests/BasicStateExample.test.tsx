import { StrictMode } from 'react';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { describe, test, expect } from 'vitest';
import BasicStateExample from '../components/examples/BasicStateExample';

describe('BasicStateExample', () => {
  test('each press flips the state exactly once, even under StrictMode', async () => {
    render(
      <StrictMode>
        <BasicStateExample />
      </StrictMode>,
    );
    const circle = screen.getByTestId('basic-circle');
    const button = screen.getByRole('button', { name: 'Toggle State' });
    expect(circle).toHaveAttribute('data-active', 'false');

    await userEvent.click(button);
    expect(circle).toHaveAttribute('data-active', 'true');

    await userEvent.click(button);
    expect(circle).toHaveAttribute('data-active', 'false');
  });
});
