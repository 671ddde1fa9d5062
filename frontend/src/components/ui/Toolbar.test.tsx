import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { describe, it, expect, vi } from 'vitest';
import { Toolbar } from '@/components/ui/Toolbar';

const defaultProps = {
  label: 'red roomba',
  imageName: 'kitchen.jpg',
  imageIndex: 0,
  imageCount: 5,
  dirty: false,
  disabled: false,
  onPrevImage: vi.fn(),
  onNextImage: vi.fn(),
  onUndo: vi.fn(),
  onClearAnnotations: vi.fn(),
  onQuit: vi.fn(),
};

describe('Toolbar', () => {
  it('should show the session label and image name', () => {
    render(<Toolbar {...defaultProps} />);

    expect(screen.getByText('red roomba')).toBeInTheDocument();
    expect(screen.getByText('kitchen.jpg')).toBeInTheDocument();
  });

  it('should display current image position', () => {
    render(<Toolbar {...defaultProps} imageIndex={2} imageCount={10} />);

    expect(screen.getByText('3 / 10')).toBeInTheDocument();
  });

  it('should display 0 / 0 when no images', () => {
    render(<Toolbar {...defaultProps} imageCount={0} />);

    expect(screen.getByText('0 / 0')).toBeInTheDocument();
  });

  it('should flag unsaved changes', () => {
    const { rerender } = render(<Toolbar {...defaultProps} />);
    expect(screen.queryByText('unsaved')).not.toBeInTheDocument();

    rerender(<Toolbar {...defaultProps} dirty />);

    expect(screen.getByText('unsaved')).toBeInTheDocument();
  });

  it('should call onPrevImage when Prev button clicked', async () => {
    const onPrevImage = vi.fn();
    const user = userEvent.setup();
    render(<Toolbar {...defaultProps} onPrevImage={onPrevImage} />);

    await user.click(screen.getByRole('button', { name: /prev/i }));

    expect(onPrevImage).toHaveBeenCalledOnce();
  });

  it('should call onNextImage when Next button clicked', async () => {
    const onNextImage = vi.fn();
    const user = userEvent.setup();
    render(<Toolbar {...defaultProps} onNextImage={onNextImage} />);

    await user.click(screen.getByRole('button', { name: /next/i }));

    expect(onNextImage).toHaveBeenCalledOnce();
  });

  it('should call onUndo when Undo button clicked', async () => {
    const onUndo = vi.fn();
    const user = userEvent.setup();
    render(<Toolbar {...defaultProps} onUndo={onUndo} />);

    await user.click(screen.getByRole('button', { name: /undo/i }));

    expect(onUndo).toHaveBeenCalledOnce();
  });

  it('should call onClearAnnotations when Clear button clicked', async () => {
    const onClearAnnotations = vi.fn();
    const user = userEvent.setup();
    render(<Toolbar {...defaultProps} onClearAnnotations={onClearAnnotations} />);

    await user.click(screen.getByRole('button', { name: /clear/i }));

    expect(onClearAnnotations).toHaveBeenCalledOnce();
  });

  it('should call onQuit when Quit button clicked', async () => {
    const onQuit = vi.fn();
    const user = userEvent.setup();
    render(<Toolbar {...defaultProps} onQuit={onQuit} />);

    await user.click(screen.getByRole('button', { name: /quit/i }));

    expect(onQuit).toHaveBeenCalledOnce();
  });

  it('should disable every command once disabled', () => {
    render(<Toolbar {...defaultProps} disabled />);

    for (const name of [/prev/i, /next/i, /undo/i, /clear/i, /quit/i]) {
      expect(screen.getByRole('button', { name })).toBeDisabled();
    }
  });
});
