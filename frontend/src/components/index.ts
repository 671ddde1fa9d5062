export { AnnotationCanvas } from './canvas/AnnotationCanvas';
export { AnnotationList } from './ui/AnnotationList';
export { Toolbar } from './ui/Toolbar';
export { ToastContainer } from './ui/Toast';
