import { render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { describe, test, expect } from 'vitest';
import CombinedTransitionExample from '../components/examples/CombinedTransitionExample';
import CustomSpringExample from '../components/examples/CustomSpringExample';
import TimingCurveExample from '../components/examples/TimingCurveExample';
import ModifierExample from '../components/examples/ModifierExample';
import RepeatDelayExample from '../components/examples/RepeatDelayExample';
import Rotation3DExample from '../components/examples/Rotation3DExample';
import SharedLayoutExample from '../components/examples/SharedLayoutExample';
import DragExample from '../components/examples/DragExample';

describe('example screens', () => {
  test('combined transition inserts and removes the greeting', async () => {
    render(<CombinedTransitionExample />);
    expect(screen.queryByText('Hello, World!')).not.toBeInTheDocument();

    await userEvent.click(screen.getByRole('button', { name: 'Toggle' }));
    expect(screen.getByText('Hello, World!')).toBeInTheDocument();

    await userEvent.click(screen.getByRole('button', { name: 'Toggle' }));
    await waitFor(() => expect(screen.queryByText('Hello, World!')).not.toBeInTheDocument());
  });

  test('spring moves between 0 and 200', async () => {
    render(<CustomSpringExample />);
    const circle = screen.getByTestId('spring-circle');
    expect(circle).toHaveAttribute('data-position', '0');
    await userEvent.click(screen.getByRole('button', { name: 'Animate' }));
    expect(circle).toHaveAttribute('data-position', '200');
    await userEvent.click(screen.getByRole('button', { name: 'Animate' }));
    expect(circle).toHaveAttribute('data-position', '0');
  });

  test('timing curve moves between 0 and 200', async () => {
    render(<TimingCurveExample />);
    const rect = screen.getByTestId('timing-rect');
    await userEvent.click(screen.getByRole('button', { name: 'Animate' }));
    expect(rect).toHaveAttribute('data-offset', '200');
    await userEvent.click(screen.getByRole('button', { name: 'Animate' }));
    expect(rect).toHaveAttribute('data-offset', '0');
  });

  test('rotation accumulates while the scale flips', async () => {
    render(<ModifierExample />);
    const square = screen.getByTestId('modifier-square');
    const button = screen.getByRole('button', { name: 'Rotate and Scale' });
    expect(square).toHaveAttribute('data-angle', '0');
    expect(square).toHaveAttribute('data-scale', '1');

    await userEvent.click(button);
    expect(square).toHaveAttribute('data-angle', '45');
    expect(square).toHaveAttribute('data-scale', '1.5');

    await userEvent.click(button);
    expect(square).toHaveAttribute('data-angle', '90');
    expect(square).toHaveAttribute('data-scale', '1');
  });

  test('repeat example adds a full turn per press', async () => {
    render(<RepeatDelayExample />);
    const rect = screen.getByTestId('repeat-rect');
    await userEvent.click(screen.getByRole('button', { name: 'Start Animation' }));
    expect(rect).toHaveAttribute('data-rotation', '360');
    await userEvent.click(screen.getByRole('button', { name: 'Start Animation' }));
    expect(rect).toHaveAttribute('data-rotation', '720');
  });

  test('3D rotation steps by 45 degrees', async () => {
    render(<Rotation3DExample />);
    const square = screen.getByTestId('rotation-3d-square');
    await userEvent.click(screen.getByRole('button', { name: 'Rotate 3D' }));
    expect(square).toHaveAttribute('data-angle', '45');
    await userEvent.click(screen.getByRole('button', { name: 'Rotate 3D' }));
    expect(square).toHaveAttribute('data-angle', '90');
  });

  test('shared layout toggles between the two frames', async () => {
    render(<SharedLayoutExample />);
    const rect = screen.getByTestId('shared-rect');
    expect(rect).toHaveAttribute('data-expanded', 'false');
    await userEvent.click(screen.getByRole('button', { name: 'Toggle Size' }));
    expect(screen.getByTestId('shared-rect')).toHaveAttribute('data-expanded', 'true');
  });

  test('drag example rests at the origin with a caption and no button', () => {
    render(<DragExample />);
    const star = screen.getByTestId('drag-star');
    expect(star).toHaveAttribute('data-offset-x', '0');
    expect(star).toHaveAttribute('data-offset-y', '0');
    expect(star).toHaveAttribute('data-dragging', 'false');
    expect(screen.getByText('Drag me!')).toBeInTheDocument();
    expect(screen.queryByRole('button')).not.toBeInTheDocument();
  });
});
